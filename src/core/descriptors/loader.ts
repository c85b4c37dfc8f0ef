/**
 * Builds snippets from a descriptor document.
 */
import { loadYamlWithSchema } from '../../utils/yaml.js';
import type { Logger } from '../../utils/logger.js';
import { createFailureHandler, type FailurePolicy, type ParameterKind } from '../snippet/failure-handlers.js';
import type { ParametersSnippet } from '../snippet/parameters-snippet.js';
import { pathParameters } from '../snippet/path-parameters.js';
import { requestParameters } from '../snippet/request-parameters.js';
import { ParameterDescriptor } from './descriptor.js';
import { DescriptorDocumentSchema, type DescriptorDocument, type SnippetType } from './schema.js';

export interface BuildSnippetsOptions {
  failurePolicy: FailurePolicy;
  logger: Pick<Logger, 'warn'>;
}

const KIND_BY_TYPE: Record<SnippetType, ParameterKind> = {
  'request-parameters': 'Request',
  'path-parameters': 'Path',
};

/**
 * One snippet per document entry, in document order.
 * @throws InvalidDescriptorError for a blank parameter name or description
 */
export function buildSnippets(
  document: DescriptorDocument,
  options: BuildSnippetsOptions
): ParametersSnippet<ParameterDescriptor>[] {
  return document.snippets.map((entry) => {
    const descriptors = entry.parameters.map(
      (param) => new ParameterDescriptor(param.name, param.description, param.attributes)
    );
    const snippetOptions = {
      attributes: entry.attributes,
      failureHandler: createFailureHandler(KIND_BY_TYPE[entry.type], options.failurePolicy, options.logger),
    };
    return entry.type === 'path-parameters'
      ? pathParameters(descriptors, snippetOptions)
      : requestParameters(descriptors, snippetOptions);
  });
}

export async function loadDescriptorDocument(filePath: string): Promise<DescriptorDocument> {
  return loadYamlWithSchema(filePath, DescriptorDocumentSchema);
}

/**
 * Load a descriptor document and build its snippets.
 */
export async function loadSnippets(
  filePath: string,
  options: BuildSnippetsOptions
): Promise<ParametersSnippet<ParameterDescriptor>[]> {
  return buildSnippets(await loadDescriptorDocument(filePath), options);
}
