/**
 * Formatter type definitions.
 */
import type { CheckSummary } from '../../core/documentation/runner.js';
import type { TemplateEngine } from '../../core/snippet/types.js';

export type { OutputFormat } from '../../core/config/schema.js';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

/**
 * Output formatters render snippet models and check summaries.
 */
export interface IFormatter extends TemplateEngine {
  /** File extension for rendered snippets */
  readonly extension: string;

  formatSummary(summary: CheckSummary): string;
}
