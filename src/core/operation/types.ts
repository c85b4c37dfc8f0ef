/**
 * Captured interaction types.
 */

/** Attribute holding the request's path template, e.g. `/users/{id}`. */
export const URL_TEMPLATE_ATTRIBUTE = 'urlTemplate';

/**
 * Request half of a captured operation.
 */
export interface OperationRequest {
  method: string;
  uri: string;
  /** Header name -> values */
  headers: Record<string, string[]>;
  /** Query and form parameters: name -> values */
  parameters: Record<string, string[]>;
  /** Raw body, if any */
  content?: string;
}

/**
 * One documented API call.
 */
export interface Operation {
  /** Used as the output directory name for the operation's snippets */
  name: string;
  request: OperationRequest;
  attributes: Record<string, unknown>;
}
