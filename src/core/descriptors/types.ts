/**
 * Descriptor type definitions.
 */

/**
 * Renderable representation of one documented parameter.
 */
export type ParameterModel = Record<string, unknown> & {
  name: string;
  description: string;
};

/**
 * Anything the registry can hold: a named, described parameter that can
 * produce its own model.
 */
export interface DocumentableParameter {
  readonly name: string;
  readonly description: string;
  toModel(): ParameterModel;
}

/**
 * Outcome of checking a single descriptor.
 */
export type DescriptorValidation =
  | { valid: true }
  | { valid: false; field: 'name' | 'description'; reason: string };
