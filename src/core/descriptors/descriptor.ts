import type { DocumentableParameter, ParameterModel } from './types.js';

/**
 * Describes one request parameter.
 *
 * Attributes are passed through to the model untouched; they never replace
 * `name` or `description`.
 */
export class ParameterDescriptor implements DocumentableParameter {
  constructor(
    readonly name: string,
    readonly description: string,
    readonly attributes: Readonly<Record<string, unknown>> = {}
  ) {}

  /**
   * Returns a copy with the given attributes merged over the existing ones.
   */
  withAttributes(attributes: Record<string, unknown>): ParameterDescriptor {
    return new ParameterDescriptor(this.name, this.description, { ...this.attributes, ...attributes });
  }

  toModel(): ParameterModel {
    return { ...this.attributes, name: this.name, description: this.description };
  }
}

/**
 * Fluent entry point:
 *
 * ```ts
 * parameterWithName('page').description('Page number').withAttributes({ default: '0' })
 * ```
 */
export function parameterWithName(name: string): { description(description: string): ParameterDescriptor } {
  return {
    description: (description) => new ParameterDescriptor(name, description),
  };
}
