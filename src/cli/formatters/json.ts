import type { Report, BatchReport } from '../../core/validation/types.js';
import type { Violation } from '../../core/rules/types.js';
import { isClean } from '../../core/validation/validator.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: Report): string {
    return JSON.stringify(this.transformReport(report), null, 2);
  }

  formatBatch(batch: BatchReport): string {
    return JSON.stringify(
      {
        summary: {
          files: batch.summary.files,
          reports: batch.summary.reports,
          passed: batch.summary.passed,
          failed: batch.summary.failed,
          total_violations: batch.summary.totalViolations,
          total_structural_errors: batch.summary.totalStructuralErrors,
        },
        reports: batch.reports.map((r) => this.transformReport(r)),
      },
      null,
      2
    );
  }

  private transformReport(report: Report): Record<string, unknown> {
    return {
      file: report.file,
      profile: report.profile,
      passed: report.passed,
      clean: isClean(report),
      violations: report.violations.map((v) => this.transformViolation(v)),
      parse_errors: report.parseErrors.map((e) => ({
        code: e.code,
        line: e.lineNumber,
        text: e.line,
        message: e.message,
      })),
      file_error: report.fileError ?? null,
      evaluated: report.evaluated,
      skipped: report.skipped,
    };
  }

  private transformViolation(v: Violation): Record<string, unknown> {
    return {
      code: v.code,
      rule_id: v.ruleId,
      rule_type: v.ruleType,
      kind: v.kind,
      key: v.key,
      keys: v.keys,
      expected: v.expected,
      actual: v.actual,
      profile: v.profile,
      line: v.line,
      message: v.message,
      why: v.why,
    };
  }
}
