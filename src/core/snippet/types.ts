/**
 * Snippet type definitions.
 */
import type { Operation } from '../operation/types.js';
import type { ParameterModel } from '../descriptors/types.js';

/**
 * Supplies the parameter names actually present in an operation.
 * Must return the complete set; duplicates collapse and order is irrelevant.
 */
export interface ActualParameterExtractor {
  extractActualParameters(operation: Operation): ReadonlySet<string>;
}

/**
 * Reacts to a mismatch between documented and actual names.
 *
 * Throwing aborts model creation. Returning normally lets the model be built
 * over the full registry despite the mismatch.
 */
export interface VerificationFailureHandler {
  verificationFailed(undocumented: ReadonlySet<string>, missing: ReadonlySet<string>): void;
}

/**
 * Names present on one side only.
 */
export interface ParameterDiscrepancy {
  /** Actual names with no descriptor */
  undocumented: Set<string>;
  /** Documented names absent from the operation */
  missing: Set<string>;
}

export type SnippetModel = Record<string, unknown>;

export interface ParametersModel extends SnippetModel {
  parameters: ParameterModel[];
}

/**
 * Turns a snippet model into document text.
 */
export interface TemplateEngine {
  render(snippetName: string, model: SnippetModel): string;
}

/**
 * Persists rendered snippet text for an operation.
 */
export interface SnippetWriter {
  write(operationName: string, snippetName: string, content: string): Promise<void>;
}

export interface SnippetContext {
  templateEngine: TemplateEngine;
  writer: SnippetWriter;
}

/**
 * Something that can document an operation.
 */
export interface Snippet {
  readonly snippetName: string;
  document(operation: Operation, context: SnippetContext): Promise<void>;
}
