import type { DocumentableParameter } from '../descriptors/types.js';
import { RequestParameterExtractor } from './extractors.js';
import { ThrowingFailureHandler } from './failure-handlers.js';
import { ParametersSnippet } from './parameters-snippet.js';
import type { VerificationFailureHandler } from './types.js';

export const REQUEST_PARAMETERS_SNIPPET = 'request-parameters';

export interface SnippetOptions {
  attributes?: Record<string, unknown>;
  /** Defaults to throwing on any mismatch */
  failureHandler?: VerificationFailureHandler;
}

/**
 * Snippet documenting a request's query and form parameters.
 */
export function requestParameters<D extends DocumentableParameter>(
  descriptors: Iterable<D>,
  options: SnippetOptions = {}
): ParametersSnippet<D> {
  return new ParametersSnippet({
    snippetName: REQUEST_PARAMETERS_SNIPPET,
    descriptors,
    extractor: new RequestParameterExtractor(),
    failureHandler: options.failureHandler ?? new ThrowingFailureHandler('Request'),
    attributes: options.attributes,
  });
}
