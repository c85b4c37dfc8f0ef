import type { DescriptorValidation, DocumentableParameter } from './types.js';

function hasText(value: string): boolean {
  return value.trim().length > 0;
}

/**
 * Check that a descriptor carries a non-blank name and description.
 * The name is checked first.
 */
export function validateDescriptor(descriptor: DocumentableParameter): DescriptorValidation {
  if (!hasText(descriptor.name)) {
    return { valid: false, field: 'name', reason: 'Parameter name must not be blank' };
  }
  if (!hasText(descriptor.description)) {
    return {
      valid: false,
      field: 'description',
      reason: `Description of parameter '${descriptor.name}' must not be blank`,
    };
  }
  return { valid: true };
}
