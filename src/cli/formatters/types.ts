/**
 * Formatter type definitions.
 */
import type { Report, BatchReport } from '../../core/validation/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  format: OutputFormat;
  colors: boolean;
  /** Show skipped rules */
  verbose: boolean;
  /** Show clean reports too (default: false - only failures are listed) */
  showPassing: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: Report): string;
  formatBatch(batch: BatchReport): string;
}
