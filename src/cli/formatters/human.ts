import chalk from 'chalk';
import type { Report, BatchReport } from '../../core/validation/types.js';
import type { Violation } from '../../core/rules/types.js';
import type { PropertyParseError } from '../../core/properties/types.js';
import { isClean } from '../../core/validation/validator.js';
import { formatActual, formatProfile, pluralize } from '../../utils/format.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      showPassing: options.showPassing ?? options.verbose ?? false,
    };
  }

  formatReport(report: Report): string {
    const lines: string[] = [];
    const clean = isClean(report);
    const icon = clean ? this.colorize('✓', 'green') : this.colorize('✗', 'red');
    const status = clean ? this.colorize('PASS', 'green') : this.colorize('FAIL', 'red');
    lines.push(`${icon} ${status}: ${report.file ?? '(text)'} [${formatProfile(report.profile)}]`);

    if (report.fileError) {
      lines.push(`   ${this.colorize(`${report.fileError.code}: ${report.fileError.message}`, 'red')}`);
    }

    if (report.parseErrors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`PARSE ERRORS (${report.parseErrors.length}):`, 'red')}`);
      for (const error of report.parseErrors) {
        lines.push(this.formatParseError(error));
      }
    }

    if (report.violations.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`VIOLATIONS (${report.violations.length}):`, 'red')}`);
      for (const violation of report.violations) {
        lines.push(...this.formatViolation(violation));
      }
    }

    if (this.options.verbose) {
      lines.push('');
      lines.push(`   ${this.colorize(`Evaluated ${pluralize(report.evaluated, 'rule')}`, 'dim')}`);
      if (report.skipped.length > 0) {
        lines.push(`   ${this.colorize(`Skipped for this profile: ${report.skipped.join(', ')}`, 'dim')}`);
      }
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchReport): string {
    const { summary } = batch;

    if (summary.failed === 0 && !this.options.showPassing) {
      return this.colorize(
        `✓ Validation successful. No errors found (${pluralize(summary.files, 'file')}, ${pluralize(summary.reports, 'profile check')}).`,
        'green'
      );
    }

    const lines: string[] = [];
    for (const report of batch.reports) {
      if (!this.options.showPassing && isClean(report)) {
        continue;
      }
      lines.push(this.formatReport(report));
      lines.push('');
    }

    lines.push(this.formatSummary(batch));
    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string[] {
    const location = violation.line !== null ? `Line ${violation.line}` : 'Missing';
    const lines = [
      `      ${location}: [${violation.ruleId}] ${violation.key}`,
      `        ${violation.message}`,
      `        Expected: ${violation.expected}`,
      `        Actual:   ${formatActual(violation.actual)}`,
    ];

    if (violation.kind !== 'constraint') {
      lines.push(`        ${this.colorize(`Kind: ${violation.kind}`, 'yellow')}`);
    }

    if (violation.why) {
      lines.push(`        ${this.colorize(`Why: ${violation.why}`, 'dim')}`);
    }

    return lines;
  }

  private formatParseError(error: PropertyParseError): string {
    return `      Line ${error.lineNumber}: ${error.code} ${error.message}`;
  }

  private formatSummary(batch: BatchReport): string {
    const { summary } = batch;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const passedText = this.colorize(`${summary.passed} passed`, 'green');
    const failedText = this.colorize(`${summary.failed} failed`, 'red');
    lines.push(`SUMMARY: ${passedText}, ${failedText}`);
    lines.push(`Violations: ${summary.totalViolations}, structural errors: ${summary.totalStructuralErrors}`);
    lines.push(`Files: ${summary.files}`);

    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
