/**
 * Captured operation exports barrel file.
 */
export * from './types.js';
export * from './schema.js';
export * from './loader.js';
