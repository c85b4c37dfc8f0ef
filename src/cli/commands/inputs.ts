import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import type { ParameterDescriptor } from '../../core/descriptors/descriptor.js';
import { loadSnippets } from '../../core/descriptors/loader.js';
import { loadOperation } from '../../core/operation/loader.js';
import type { Operation } from '../../core/operation/types.js';
import type { ParametersSnippet } from '../../core/snippet/parameters-snippet.js';
import { logger } from '../../utils/logger.js';

export interface CommandInputs {
  config: Config;
  snippets: ParametersSnippet<ParameterDescriptor>[];
  operations: Operation[];
}

/**
 * Load config, the descriptor document and every captured operation.
 * Paths are resolved against the project root. Applies the configured log level.
 */
export async function loadCommandInputs(
  projectRoot: string,
  descriptorPath: string,
  operationPaths: string[],
  configPath?: string
): Promise<CommandInputs> {
  const config = await loadConfig(projectRoot, configPath);
  logger.setLevel(config.logging.level);

  const snippets = await loadSnippets(path.resolve(projectRoot, descriptorPath), {
    failurePolicy: config.verification.on_failure,
    logger: logger.child('verify'),
  });
  logger.debug(`Loaded ${snippets.length} snippet(s) from ${descriptorPath}`);

  const operations = await Promise.all(
    operationPaths.map((operationPath) => loadOperation(path.resolve(projectRoot, operationPath)))
  );

  return { config, snippets, operations };
}
