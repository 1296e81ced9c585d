/**
 * Property store barrel file.
 */
export * from './types.js';
export * from './parser.js';
export * from './store.js';
