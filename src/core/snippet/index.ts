/**
 * Snippet exports barrel file.
 */
export * from './types.js';
export * from './verifier.js';
export * from './failure-handlers.js';
export * from './extractors.js';
export * from './templated-snippet.js';
export * from './parameters-snippet.js';
export * from './request-parameters.js';
export * from './path-parameters.js';
export * from './writer.js';
