/**
 * Error types and codes for propcheck.
 * Every thrown error extends PropCheckError. Rule violations and property
 * parse errors are values, not exceptions.
 */

/**
 * Base error class for all propcheck errors.
 */
export class PropCheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PropCheckError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PropCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Rule catalogue errors: invalid rule definitions, duplicate ids, bad patterns.
 * Raised while the catalogue is built, never during evaluation.
 */
export class CatalogueError extends PropCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CatalogueError';
  }
}

/**
 * System errors (file not readable, YAML parse failures).
 */
export class SystemError extends PropCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Rule violations (R001-R009, one per rule type)
  EXACT_VALUE: 'R001',
  OPTIONAL_EXACT_VALUE: 'R002',
  ONE_OF: 'R003',
  NUMERIC_RANGE: 'R004',
  REGEX_MATCH: 'R005',
  RATIO_OR_ORDERING: 'R006',
  MUTUAL_EXCLUSIVITY: 'R007',
  CONDITIONAL_RANGE: 'R008',
  MUST_BE_ABSENT: 'R009',
  MALFORMED_VALUE: 'R100',
  EVALUATION_ERROR: 'R101',

  // Property file structure (P001-P003)
  MISSING_SEPARATOR: 'P001',
  EMPTY_KEY: 'P002',
  EMPTY_PROFILE: 'P003',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  FILE_NOT_READABLE: 'S002',
  INVALID_CATALOGUE: 'S003',
  INVALID_CONFIG: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
