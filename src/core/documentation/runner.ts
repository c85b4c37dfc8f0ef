/**
 * Runs a set of snippets against captured operations.
 */
import { ParamDocError, VerificationFailedError } from '../../utils/errors.js';
import type { Operation } from '../operation/types.js';
import type { ParametersSnippet } from '../snippet/parameters-snippet.js';
import type { SnippetContext } from '../snippet/types.js';

/**
 * Outcome of one snippet against one operation.
 */
export interface CheckResult {
  operation: string;
  snippet: string;
  passed: boolean;
  /** Error code and message when the check failed */
  code?: string;
  message?: string;
  undocumented?: string[];
  missing?: string[];
}

export interface CheckSummary {
  results: CheckResult[];
  passed: number;
  failed: number;
}

function failure(operation: Operation, snippetName: string, error: ParamDocError): CheckResult {
  const result: CheckResult = {
    operation: operation.name,
    snippet: snippetName,
    passed: false,
    code: error.code,
    message: error.message,
  };
  if (error instanceof VerificationFailedError) {
    result.undocumented = error.undocumented;
    result.missing = error.missing;
  }
  return result;
}

/**
 * Attempt one snippet against one operation, turning paramdoc errors into a
 * failed result. Anything else propagates.
 */
async function attempt(
  operation: Operation,
  snippet: ParametersSnippet,
  run: () => Promise<void> | void
): Promise<CheckResult> {
  try {
    await run();
    return { operation: operation.name, snippet: snippet.snippetName, passed: true };
  } catch (error) {
    if (error instanceof ParamDocError) {
      return failure(operation, snippet.snippetName, error);
    }
    throw error;
  }
}

function summarize(results: CheckResult[]): CheckSummary {
  const passed = results.filter((r) => r.passed).length;
  return { results, passed, failed: results.length - passed };
}

/**
 * Verify every snippet against every operation without rendering anything.
 */
export async function checkOperations(
  snippets: ParametersSnippet[],
  operations: Operation[]
): Promise<CheckSummary> {
  const results: CheckResult[] = [];
  for (const operation of operations) {
    for (const snippet of snippets) {
      results.push(await attempt(operation, snippet, () => {
        snippet.createModel(operation);
      }));
    }
  }
  return summarize(results);
}

/**
 * Render and write every snippet for every operation. A failing snippet does
 * not stop the others.
 */
export async function documentOperations(
  snippets: ParametersSnippet[],
  operations: Operation[],
  context: SnippetContext
): Promise<CheckSummary> {
  const results: CheckResult[] = [];
  for (const operation of operations) {
    for (const snippet of snippets) {
      results.push(await attempt(operation, snippet, () => snippet.document(operation, context)));
    }
  }
  return summarize(results);
}
