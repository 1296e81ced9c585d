/**
 * Library exports.
 */

// Configuration
export * from './core/config/index.js';

// Properties
export * from './core/properties/index.js';

// Rules
export * from './core/rules/index.js';

// Validation
export * from './core/validation/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export { runCheck, type CheckOptions } from './cli/commands/check.js';
export { CompactFormatter, HumanFormatter, JsonFormatter, type IFormatter, type FormatOptions } from './cli/formatters/index.js';
