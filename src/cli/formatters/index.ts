/**
 * Formatter exports barrel file.
 */
export * from './types.js';
export { JsonFormatter } from './json.js';
export { HumanFormatter } from './human.js';
