/**
 * Documentation runner exports barrel file.
 */
export * from './runner.js';
