/**
 * Tests for the compact formatter.
 */
import { describe, it, expect } from 'vitest';
import { CompactFormatter } from '../../../../src/cli/formatters/compact.js';
import {
  acksViolation,
  malformedViolation,
  parseError,
  createReport,
  createBatch,
} from '../../../fixtures/reports.js';

describe('CompactFormatter', () => {
  const formatter = new CompactFormatter();

  it('should print one line per violation', () => {
    const report = createReport({ profile: 'prod', violations: [acksViolation, malformedViolation], passed: false });

    expect(formatter.formatReport(report)).toBe([
      "app.properties:3: prod [producer-acks] acks: expected all, actual '1'",
      'app.properties:0: prod [standby] standby: expected integer in [0, 2], actual absent',
    ].join('\n'));
  });

  it('should print nothing for a clean report', () => {
    expect(formatter.formatReport(createReport())).toBe('');
  });

  it('should print file errors and parse errors', () => {
    const report = createReport({
      parseErrors: [parseError],
      fileError: { code: 'S002', message: 'Cannot read' },
    });

    expect(formatter.formatReport(report)).toBe([
      'app.properties:0: ERROR [S002] Cannot read',
      "app.properties:5: PARSE [P001] 'oops' does not match 'key=value' format",
    ].join('\n'));
  });

  it('should print parse errors once per file', () => {
    const base = createReport({ parseErrors: [parseError] });
    const prod = createReport({ profile: 'prod', parseErrors: [parseError], violations: [acksViolation], passed: false });
    const batch = createBatch([base, prod], { failed: 2, totalViolations: 1, totalStructuralErrors: 1 });

    expect(formatter.formatBatch(batch)).toBe([
      "app.properties:5: PARSE [P001] 'oops' does not match 'key=value' format",
      "app.properties:3: prod [producer-acks] acks: expected all, actual '1'",
      '',
      'SUMMARY: 1 violation, 1 structural error (1 file checked)',
    ].join('\n'));
  });

  it('should summarise a clean batch', () => {
    const batch = createBatch([createReport()], { files: 2, passed: 1 });

    expect(formatter.formatBatch(batch)).toBe('SUMMARY: 0 issues (2 files checked)');
  });
});
