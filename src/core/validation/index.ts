/**
 * Validation barrel file.
 */
export * from './types.js';
export * from './validator.js';
export * from './engine.js';
