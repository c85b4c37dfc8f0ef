/**
 * Ordered, name-keyed collection of parameter descriptors.
 *
 * Built once from a descriptor list and read-only afterwards. Iteration order
 * is the order in which each name first appeared; that order becomes the
 * order of the rendered model.
 */
import { InvalidDescriptorError, ErrorCodes } from '../../utils/errors.js';
import type { DocumentableParameter } from './types.js';
import { validateDescriptor } from './validate.js';

export class DescriptorRegistry<D extends DocumentableParameter = DocumentableParameter> {
  private readonly byName = new Map<string, D>();

  /**
   * @throws InvalidDescriptorError on the first descriptor with a blank name or description
   */
  constructor(descriptors: Iterable<D>) {
    let index = 0;
    for (const descriptor of descriptors) {
      const validation = validateDescriptor(descriptor);
      if (!validation.valid) {
        throw new InvalidDescriptorError(
          validation.field === 'name' ? ErrorCodes.BLANK_NAME : ErrorCodes.BLANK_DESCRIPTION,
          validation.reason,
          { index, field: validation.field, name: descriptor.name }
        );
      }
      // Map.set on an existing key replaces the value and keeps its position.
      this.byName.set(descriptor.name, descriptor);
      index++;
    }
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): D | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * The name -> descriptor mapping, as a new map on every call.
   */
  entries(): ReadonlyMap<string, D> {
    return new Map(this.byName);
  }

  /**
   * The documented names, as a new set on every call.
   */
  names(): Set<string> {
    return new Set(this.byName.keys());
  }

  /**
   * Descriptors in registry order.
   */
  descriptors(): D[] {
    return Array.from(this.byName.values());
  }
}
