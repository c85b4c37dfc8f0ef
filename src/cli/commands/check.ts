import { Command } from 'commander';
import { checkOperations } from '../../core/documentation/runner.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter, JsonFormatter } from '../formatters/index.js';
import { loadCommandInputs } from './inputs.js';

interface CheckCommandOptions {
  json?: boolean;
  config?: string;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Verify documented parameters against captured operations')
    .argument('<descriptors>', 'Descriptor document (YAML)')
    .argument('<operations...>', 'Captured operation files (YAML or JSON)')
    .option('--json', 'Output in JSON format')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (descriptorPath: string, operationPaths: string[], options: CheckCommandOptions) => {
      let exitCode = 0;
      try {
        const { snippets, operations } = await loadCommandInputs(
          process.cwd(),
          descriptorPath,
          operationPaths,
          options.config
        );
        const summary = await checkOperations(snippets, operations);
        const formatter = options.json ? new JsonFormatter() : new HumanFormatter();
        console.log(formatter.formatSummary(summary));
        exitCode = summary.failed > 0 ? 1 : 0;
      } catch (error) {
        logger.error('Check failed', error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
