/**
 * Rule catalogue barrel file.
 */
export * from './schema.js';
export * from './types.js';
export * from './base.js';
export * from './numeric.js';
export * from './registry.js';
export * from './catalogue.js';
export * from './loader.js';
export * from './exact-value.js';
export * from './optional-exact-value.js';
export * from './one-of.js';
export * from './numeric-range.js';
export * from './regex-match.js';
export * from './ratio-or-ordering.js';
export * from './mutual-exclusivity.js';
export * from './conditional-range.js';
export * from './must-be-absent.js';
