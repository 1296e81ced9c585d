/**
 * Output formatters barrel file.
 */
export * from './types.js';
export * from './human.js';
export * from './json.js';
export * from './compact.js';
