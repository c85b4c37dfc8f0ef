import * as path from 'node:path';
import { Command, Option } from 'commander';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { documentOperations } from '../../core/documentation/runner.js';
import { FileSnippetWriter } from '../../core/snippet/writer.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter, JsonFormatter, type IFormatter } from '../formatters/index.js';
import { loadCommandInputs } from './inputs.js';

interface DocumentCommandOptions {
  outputDir?: string;
  format?: string;
  config?: string;
}

function createFormatter(format: string): IFormatter {
  return OutputFormatSchema.parse(format) === 'json'
    ? new JsonFormatter()
    : new HumanFormatter({ colors: false });
}

/**
 * Create the document command.
 */
export function createDocumentCommand(): Command {
  return new Command('document')
    .description('Write parameter snippets for captured operations')
    .argument('<descriptors>', 'Descriptor document (YAML)')
    .argument('<operations...>', 'Captured operation files (YAML or JSON)')
    .option('-o, --output-dir <dir>', 'Directory snippets are written to (overrides config)')
    .addOption(new Option('--format <format>', 'Snippet format (overrides config)').choices(['human', 'json']))
    .option('-c, --config <path>', 'Path to config file')
    .action(async (descriptorPath: string, operationPaths: string[], options: DocumentCommandOptions) => {
      let exitCode = 0;
      try {
        const projectRoot = process.cwd();
        const { config, snippets, operations } = await loadCommandInputs(
          projectRoot,
          descriptorPath,
          operationPaths,
          options.config
        );

        const formatter = createFormatter(options.format ?? config.output.format);
        const outputDir = path.resolve(projectRoot, options.outputDir ?? config.output.directory);
        const writer = new FileSnippetWriter(outputDir, formatter.extension);

        const summary = await documentOperations(snippets, operations, { templateEngine: formatter, writer });
        for (const result of summary.results.filter((r) => r.passed)) {
          logger.success(`Wrote ${writer.resolvePath(result.operation, result.snippet)}`);
        }
        console.log(new HumanFormatter().formatSummary(summary));
        exitCode = summary.failed > 0 ? 1 : 0;
      } catch (error) {
        logger.error('Documentation failed', error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
