/**
 * paramdoc: verify documented request parameters against captured
 * operations and build the models their snippets are rendered from.
 */

// Configuration
export * from './core/config/index.js';

// Descriptors
export * from './core/descriptors/index.js';

// Captured operations
export * from './core/operation/index.js';

// Snippets
export * from './core/snippet/index.js';

// Runner
export * from './core/documentation/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
