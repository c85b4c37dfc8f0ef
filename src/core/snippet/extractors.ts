import { MissingUrlTemplateError } from '../../utils/errors.js';
import { URL_TEMPLATE_ATTRIBUTE, type Operation } from '../operation/types.js';
import type { ActualParameterExtractor } from './types.js';

const PATH_VARIABLE = /\{([^/]+?)\}/g;

/**
 * Query and form parameters of the request.
 */
export class RequestParameterExtractor implements ActualParameterExtractor {
  extractActualParameters(operation: Operation): ReadonlySet<string> {
    return new Set(Object.keys(operation.request.parameters));
  }
}

/**
 * Read the URL template an operation was captured with.
 * @throws MissingUrlTemplateError when the operation has none
 */
export function getUrlTemplate(operation: Operation): string {
  const template = operation.attributes[URL_TEMPLATE_ATTRIBUTE];
  if (typeof template !== 'string') {
    throw new MissingUrlTemplateError(
      `urlTemplate not found for operation '${operation.name}'. Capture the request with its path template to document path parameters.`,
      { operation: operation.name }
    );
  }
  return template;
}

/**
 * Variables named in a path template, e.g. `/users/{id}/posts/{postId}` -> {id, postId}.
 */
export function parsePathVariables(template: string): Set<string> {
  const names = new Set<string>();
  for (const match of template.matchAll(PATH_VARIABLE)) {
    names.add(match[1]);
  }
  return names;
}

/**
 * Path variables of the operation's URL template.
 */
export class PathParameterExtractor implements ActualParameterExtractor {
  extractActualParameters(operation: Operation): ReadonlySet<string> {
    return parsePathVariables(getUrlTemplate(operation));
  }
}
