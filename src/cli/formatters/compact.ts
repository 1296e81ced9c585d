/**
 * Compact output formatter for CI and pre-commit hooks.
 * One line per issue: file:line: PROFILE [rule] key: expected X, actual Y
 */
import type { Report, BatchReport } from '../../core/validation/types.js';
import type { Violation } from '../../core/rules/types.js';
import { formatActual, formatProfile, pluralize } from '../../utils/format.js';
import type { IFormatter } from './types.js';

export class CompactFormatter implements IFormatter {
  formatReport(report: Report): string {
    const file = report.file ?? '(text)';
    const lines: string[] = [];

    if (report.fileError) {
      lines.push(`${file}:0: ERROR [${report.fileError.code}] ${report.fileError.message}`);
    }

    for (const error of report.parseErrors) {
      lines.push(`${file}:${error.lineNumber}: PARSE [${error.code}] ${error.message}`);
    }

    for (const violation of report.violations) {
      lines.push(this.formatViolation(file, report.profile, violation));
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchReport): string {
    const lines: string[] = [];
    const reportedParseErrors = new Set<string>();

    for (const report of batch.reports) {
      // Parse errors belong to the file, not the profile; print them once
      const key = report.file ?? '';
      const formatted = reportedParseErrors.has(key)
        ? this.formatReport({ ...report, parseErrors: [] })
        : this.formatReport(report);
      reportedParseErrors.add(key);
      if (formatted) {
        lines.push(formatted);
      }
    }

    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(this.formatSummary(batch));

    return lines.join('\n');
  }

  private formatViolation(file: string, profile: string, violation: Violation): string {
    const line = violation.line ?? 0;
    return `${file}:${line}: ${formatProfile(profile)} [${violation.ruleId}] ${violation.key}: expected ${violation.expected}, actual ${formatActual(violation.actual)}`;
  }

  private formatSummary(batch: BatchReport): string {
    const { summary } = batch;
    const parts: string[] = [];

    if (summary.totalViolations > 0) {
      parts.push(pluralize(summary.totalViolations, 'violation'));
    }
    if (summary.totalStructuralErrors > 0) {
      parts.push(pluralize(summary.totalStructuralErrors, 'structural error'));
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }

    return `SUMMARY: ${parts.join(', ')} (${pluralize(summary.files, 'file')} checked)`;
  }
}
