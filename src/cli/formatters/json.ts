import type { CheckSummary } from '../../core/documentation/runner.js';
import type { SnippetModel } from '../../core/snippet/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  readonly extension = 'json';

  render(_snippetName: string, model: SnippetModel): string {
    return JSON.stringify(model, null, 2);
  }

  formatSummary(summary: CheckSummary): string {
    return JSON.stringify(
      {
        passed: summary.failed === 0,
        summary: { passed: summary.passed, failed: summary.failed },
        results: summary.results,
      },
      null,
      2
    );
  }
}
