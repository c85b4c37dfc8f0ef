/**
 * Tests for the descriptor registry.
 */
import { describe, it, expect } from 'vitest';
import { DescriptorRegistry } from '../../../../src/core/descriptors/registry.js';
import { ParameterDescriptor } from '../../../../src/core/descriptors/descriptor.js';
import { InvalidDescriptorError, ErrorCodes } from '../../../../src/utils/errors.js';
import { captureError } from '../../../fixtures/capture.js';

const d = (name: string, description: string) => new ParameterDescriptor(name, description);

describe('DescriptorRegistry', () => {
  it('keeps descriptors in insertion order', () => {
    const registry = new DescriptorRegistry([d('page', 'Page number'), d('size', 'Page size'), d('sort', 'Sort key')]);

    expect(Array.from(registry.entries().keys())).toEqual(['page', 'size', 'sort']);
    expect(registry.size).toBe(3);
  });

  it('replaces a duplicate name in place (last write wins, first position kept)', () => {
    const registry = new DescriptorRegistry([d('a', 'x'), d('b', 'other'), d('a', 'y')]);

    expect(registry.size).toBe(2);
    expect(registry.get('a')?.description).toBe('y');
    expect(registry.descriptors().map((desc) => desc.name)).toEqual(['a', 'b']);
  });

  it('accepts an empty descriptor list', () => {
    const registry = new DescriptorRegistry([]);

    expect(registry.size).toBe(0);
    expect(registry.names().size).toBe(0);
  });

  it('returns a copy of the mapping from entries', () => {
    const registry = new DescriptorRegistry([d('page', 'Page number')]);
    const entries = registry.entries();
    if (entries instanceof Map) {
      entries.set('injected', d('injected', 'Injected'));
    }

    expect(registry.has('injected')).toBe(false);
    expect(Array.from(registry.entries().keys())).toEqual(['page']);
  });

  it('returns a fresh name set on every call', () => {
    const registry = new DescriptorRegistry([d('page', 'Page number')]);
    const names = registry.names();
    names.add('injected');

    expect(registry.names()).toEqual(new Set(['page']));
    expect(registry.has('injected')).toBe(false);
  });

  describe('validation', () => {
    it('rejects an empty name', () => {
      expect(() => new DescriptorRegistry([d('', 'Page number')])).toThrow(InvalidDescriptorError);
    });

    it('rejects a whitespace-only name with the blank-name code', () => {
      const error = captureError(() => new DescriptorRegistry([d('page', 'Page number'), d('   ', 'Page size')]));

      expect(error).toBeInstanceOf(InvalidDescriptorError);
      expect(error).toMatchObject({
        code: ErrorCodes.BLANK_NAME,
        details: { index: 1, field: 'name', name: '   ' },
      });
    });

    it('rejects a blank description with the blank-description code', () => {
      const error = captureError(() => new DescriptorRegistry([d('page', ' \t')]));

      expect(error).toBeInstanceOf(InvalidDescriptorError);
      expect(error).toMatchObject({
        code: ErrorCodes.BLANK_DESCRIPTION,
        message: "Description of parameter 'page' must not be blank",
      });
    });

    it('reports the name before the description when both are blank', () => {
      expect(() => new DescriptorRegistry([d('', '')])).toThrow('Parameter name must not be blank');
    });
  });
});
