/**
 * Descriptor exports barrel file.
 */
export * from './types.js';
export * from './descriptor.js';
export * from './validate.js';
export * from './registry.js';
export * from './schema.js';
export * from './loader.js';
