import { loadYamlWithSchema } from '../../utils/yaml.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { baseName } from '../../utils/file-system.js';
import { CapturedOperationSchema, type CapturedOperation } from './schema.js';
import { URL_TEMPLATE_ATTRIBUTE, type Operation } from './types.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

function appendAll(target: Map<string, string[]>, params: URLSearchParams): void {
  for (const [name, value] of params) {
    const values = target.get(name);
    if (values) {
      values.push(value);
    } else {
      target.set(name, [value]);
    }
  }
}

function parseUri(uri: string): URL {
  try {
    return new URL(uri, 'http://localhost');
  } catch (error) {
    throw new SystemError(ErrorCodes.INVALID_DOCUMENT, `Invalid request uri: ${uri}`, { uri, error });
  }
}

function headerValue(headers: Record<string, string[]>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, values] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return values[0];
    }
  }
  return undefined;
}

/**
 * Derive request parameters from the URI's query string and, for
 * form-encoded requests, from the body.
 *
 * Names become own properties, so `constructor` or `__proto__` are kept like any other name.
 *
 * @throws SystemError when the URI cannot be parsed
 */
export function extractRequestParameters(
  uri: string,
  headers: Record<string, string[]>,
  content?: string
): Record<string, string[]> {
  const parameters = new Map<string, string[]>();
  appendAll(parameters, parseUri(uri).searchParams);

  const contentType = headerValue(headers, 'content-type');
  if (content && contentType?.toLowerCase().startsWith(FORM_CONTENT_TYPE)) {
    appendAll(parameters, new URLSearchParams(content));
  }
  return Object.fromEntries(parameters);
}

/**
 * Turn a validated capture into an Operation.
 */
export function toOperation(captured: CapturedOperation, fallbackName: string): Operation {
  const { request } = captured;
  const attributes: Record<string, unknown> = { ...captured.attributes };
  if (captured.url_template !== undefined) {
    attributes[URL_TEMPLATE_ATTRIBUTE] = captured.url_template;
  }

  return {
    name: captured.name ?? fallbackName,
    request: {
      method: request.method.toUpperCase(),
      uri: request.uri,
      headers: request.headers,
      parameters: request.parameters ?? extractRequestParameters(request.uri, request.headers, request.content),
      content: request.content,
    },
    attributes,
  };
}

/**
 * Load a captured operation from a YAML or JSON file.
 * The operation is named after the file unless the capture names it.
 */
export async function loadOperation(filePath: string): Promise<Operation> {
  const captured = await loadYamlWithSchema(filePath, CapturedOperationSchema);
  try {
    return toOperation(captured, baseName(filePath));
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}
