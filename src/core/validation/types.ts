/**
 * Validation result type definitions.
 */
import type { Violation } from '../rules/types.js';
import type { PropertyParseError } from '../properties/types.js';

/**
 * A file that could not be read at all.
 */
export interface FileError {
  code: string;
  message: string;
}

/**
 * Result of validating one store under one profile.
 */
export interface Report {
  /** Source file, null for stores loaded from text */
  file: string | null;
  /** Active profile, '' for the base profile */
  profile: string;
  /** Violations in catalogue registration order */
  violations: Violation[];
  /** Malformed lines of the properties file */
  parseErrors: readonly PropertyParseError[];
  fileError?: FileError;
  /** Number of rules evaluated under this profile */
  evaluated: number;
  /** Ids of rules out of scope for this profile */
  skipped: string[];
  /** True when no rule was violated */
  passed: boolean;
}

/**
 * Result of validating several files and profiles.
 */
export interface BatchReport {
  reports: Report[];
  summary: {
    files: number;
    reports: number;
    passed: number;
    failed: number;
    totalViolations: number;
    totalStructuralErrors: number;
  };
}

export interface ExitCodes {
  success: number;
  error: number;
}
