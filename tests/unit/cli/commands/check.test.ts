/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createCheckCommand, runCheck } from '../../../../src/cli/commands/check.js';
import { logger } from '../../../../src/utils/logger.js';

const RULES = `rules:
  - id: producer-acks
    type: exact_value
    key: acks
    expected: all
`;

describe('check command', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;

  const write = (name: string, content: string): string => {
    const file = join(tempDir, name);
    writeFileSync(file, content);
    return file;
  };

  const printed = (): string => logSpy.mock.calls.map((call) => String(call[0])).join('\n');

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'propcheck-check-test-'));
    write('rules.yaml', RULES);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  describe('runCheck', () => {
    it('should return the success code for a clean file', async () => {
      write('app.properties', 'acks=all\n');

      const code = await runCheck(['app.properties'], { rules: 'rules.yaml', json: true }, tempDir);

      expect(code).toBe(0);
      expect(JSON.parse(printed())).toMatchObject({
        summary: { files: 1, reports: 1, passed: 1, failed: 0 },
      });
    });

    it('should print violations and return the error code', async () => {
      write('app.properties', 'acks=1\n');

      const code = await runCheck(['app.properties'], { rules: 'rules.yaml', format: 'compact' }, tempDir);

      expect(code).toBe(1);
      expect(printed()).toBe([
        "app.properties:1: (base) [producer-acks] acks: expected all, actual '1'",
        '',
        'SUMMARY: 1 violation (1 file checked)',
      ].join('\n'));
    });

    it('should validate under each requested profile', async () => {
      write('app.properties', 'acks=all\n%prod.acks=1\n');

      const code = await runCheck(
        ['app.properties'],
        { rules: 'rules.yaml', profile: ['base', 'prod'], format: 'json' },
        tempDir
      );

      const output: unknown = JSON.parse(printed());
      expect(code).toBe(1);
      expect(output).toMatchObject({
        summary: { reports: 2, passed: 1, failed: 1, total_violations: 1 },
        reports: [
          { profile: '', passed: true },
          { profile: 'prod', passed: false, violations: [{ rule_id: 'producer-acks', line: 2 }] },
        ],
      });
    });

    it('should take paths and format from the config file', async () => {
      mkdirSync(join(tempDir, '.propcheck'));
      write('.propcheck/config.yaml', [
        'properties:',
        '  paths: ["conf/*.properties"]',
        'catalogue:',
        '  path: rules.yaml',
        'output:',
        '  format: compact',
      ].join('\n'));
      mkdirSync(join(tempDir, 'conf'));
      write('conf/app.properties', 'acks=all\n');

      const code = await runCheck([], {}, tempDir);

      expect(code).toBe(0);
      expect(printed()).toBe('SUMMARY: 0 issues (1 file checked)');
    });

    it('should fail for a file that cannot be read', async () => {
      const code = await runCheck(['missing.properties'], { rules: 'rules.yaml', format: 'compact' }, tempDir);

      expect(code).toBe(1);
      expect(printed().split('\n')[0]).toBe(
        'missing.properties:0: ERROR [S002] Cannot read properties file: missing.properties'
      );
    });

    it('should succeed without output when nothing matches', async () => {
      const code = await runCheck(['conf/*.properties'], { rules: 'rules.yaml' }, tempDir);

      expect(code).toBe(0);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should reject an invalid concurrency', async () => {
      write('app.properties', 'acks=all\n');

      await expect(
        runCheck(['app.properties'], { rules: 'rules.yaml', concurrency: '0' }, tempDir)
      ).rejects.toThrow("Invalid --concurrency value '0' (expected a positive integer)");
    });

    it('should lower the log level when quiet', async () => {
      write('app.properties', 'acks=all\n');

      await runCheck(['app.properties'], { rules: 'rules.yaml', quiet: true }, tempDir);

      expect(logger.getLevel()).toBe('error');
    });
  });

  describe('createCheckCommand', () => {
    let exitSpy: MockInstance<typeof process.exit>;

    beforeEach(() => {
      exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
    });

    it('should create a command named check', () => {
      expect(createCheckCommand().name()).toBe('check');
    });

    it('should exit with the code of the check', async () => {
      const file = write('app.properties', 'acks=1\n');
      const command = createCheckCommand();

      await expect(
        command.parseAsync(['node', 'check', file, '--rules', join(tempDir, 'rules.yaml'), '--json'])
      ).rejects.toThrow('process.exit called');

      expect(exitSpy.mock.calls[0]).toEqual([1]);
    });
  });
});
