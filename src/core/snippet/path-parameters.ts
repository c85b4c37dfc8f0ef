import type { DocumentableParameter } from '../descriptors/types.js';
import type { Operation } from '../operation/types.js';
import { PathParameterExtractor, getUrlTemplate } from './extractors.js';
import { ThrowingFailureHandler } from './failure-handlers.js';
import { ParametersSnippet } from './parameters-snippet.js';
import type { SnippetOptions } from './request-parameters.js';
import type { ParametersModel } from './types.js';

export const PATH_PARAMETERS_SNIPPET = 'path-parameters';

export interface PathParametersModel extends ParametersModel {
  /** The URL template the variables were read from */
  path: string;
}

/**
 * Documents the variables of a request's path template. The model also
 * carries the template itself under `path`.
 */
export class PathParametersSnippet<D extends DocumentableParameter = DocumentableParameter> extends ParametersSnippet<D> {
  constructor(descriptors: Iterable<D>, options: SnippetOptions = {}) {
    super({
      snippetName: PATH_PARAMETERS_SNIPPET,
      descriptors,
      extractor: new PathParameterExtractor(),
      failureHandler: options.failureHandler ?? new ThrowingFailureHandler('Path'),
      attributes: options.attributes,
    });
  }

  createModel(operation: Operation): PathParametersModel {
    return { ...super.createModel(operation), path: getUrlTemplate(operation) };
  }
}

export function pathParameters<D extends DocumentableParameter>(
  descriptors: Iterable<D>,
  options: SnippetOptions = {}
): PathParametersSnippet<D> {
  return new PathParametersSnippet(descriptors, options);
}
