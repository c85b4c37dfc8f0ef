import chalk from 'chalk';
import type { CheckResult, CheckSummary } from '../../core/documentation/runner.js';
import type { SnippetModel } from '../../core/snippet/types.js';
import type { IFormatter, FormatOptions } from './types.js';

interface ParameterRow {
  name: string;
  description: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parameterRows(model: SnippetModel): ParameterRow[] {
  const { parameters } = model;
  if (!Array.isArray(parameters)) return [];
  return parameters.filter(isRecord).map((param) => ({
    name: String(param.name),
    description: String(param.description),
  }));
}

/**
 * Human-readable output: parameter tables and a pass/fail listing.
 */
export class HumanFormatter implements IFormatter {
  readonly extension = 'txt';
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  render(snippetName: string, model: SnippetModel): string {
    const lines: string[] = [this.colorize(snippetName, 'bold')];

    if (typeof model.path === 'string') {
      lines.push(`Path: ${model.path}`);
    }

    const rows = parameterRows(model);
    if (rows.length === 0) {
      lines.push(this.colorize('  (no parameters)', 'dim'));
      return lines.join('\n');
    }

    const width = Math.max('Parameter'.length, ...rows.map((row) => row.name.length));
    lines.push(this.colorize(`  ${'Parameter'.padEnd(width)}  Description`, 'dim'));
    for (const row of rows) {
      lines.push(`  ${row.name.padEnd(width)}  ${row.description}`);
    }
    return lines.join('\n');
  }

  formatSummary(summary: CheckSummary): string {
    const lines = summary.results.map((result) => this.formatResult(result));
    const failed = summary.failed > 0
      ? this.colorize(`${summary.failed} failed`, 'red')
      : `${summary.failed} failed`;
    lines.push('', `${this.colorize(`${summary.passed} passed`, 'green')}, ${failed}`);
    return lines.join('\n');
  }

  private formatResult(result: CheckResult): string {
    const label = `${result.operation} ${result.snippet}`;
    if (result.passed) {
      return `${this.colorize('✓', 'green')} ${label}`;
    }
    return `${this.colorize('✗', 'red')} ${label}: ${result.message ?? 'failed'}`;
  }

  private colorize(text: string, color: 'red' | 'green' | 'dim' | 'bold'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
