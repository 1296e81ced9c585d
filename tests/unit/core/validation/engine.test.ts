import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ValidationEngine } from '../../../../src/core/validation/engine.js';
import { isClean } from '../../../../src/core/validation/validator.js';
import { RuleCatalogue } from '../../../../src/core/rules/catalogue.js';
import { PropertyStore } from '../../../../src/core/properties/store.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

const createCatalogue = (): RuleCatalogue =>
  new RuleCatalogue().registerAll([
    { type: 'exact_value', id: 'producer-acks', key: 'acks', expected: 'all' },
    { type: 'numeric_range', id: 'standby', key: 'standby', max: 2, profiles: { include: ['prod'] } },
  ]);

describe('ValidationEngine', () => {
  let tempDir: string;

  const writeProperties = (name: string, content: string): string => {
    const file = join(tempDir, name);
    writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'propcheck-engine-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('profilesFor', () => {
    const store = PropertyStore.load('a=1\n%staging.a=2\n%prod.a=3');

    it('should default to the base profile', () => {
      expect(new ValidationEngine(createCatalogue()).profilesFor(store)).toEqual(['']);
    });

    it('should use the requested profiles', () => {
      const engine = new ValidationEngine(createCatalogue(), { profiles: ['prod', 'staging'] });

      expect(engine.profilesFor(store)).toEqual(['prod', 'staging']);
    });

    it('should add every profile of the file with allProfiles', () => {
      const engine = new ValidationEngine(createCatalogue(), { profiles: ['prod'], allProfiles: true });

      expect(engine.profilesFor(store)).toEqual(['prod', '', 'staging']);
    });
  });

  describe('validateStore', () => {
    it('should produce one report per profile', () => {
      const engine = new ValidationEngine(createCatalogue(), { profiles: ['', 'prod'] });
      const store = PropertyStore.load('acks=all\nstandby=3');

      const reports = engine.validateStore(store);

      expect(reports.map((r) => [r.profile, r.violations.map((v) => v.ruleId)])).toEqual([
        ['', []],
        ['prod', ['standby']],
      ]);
      expect(reports[0].skipped).toEqual(['standby']);
    });
  });

  describe('validateFiles', () => {
    it('should validate every file and summarise', async () => {
      const good = writeProperties('good.properties', 'acks=all\n');
      const bad = writeProperties('bad.properties', 'acks=1\n');

      const batch = await new ValidationEngine(createCatalogue()).validateFiles([good, bad]);

      expect(batch.reports.map((r) => [r.file, r.passed])).toEqual([
        [good, true],
        [bad, false],
      ]);
      expect(batch.summary).toEqual({
        files: 2,
        reports: 2,
        passed: 1,
        failed: 1,
        totalViolations: 1,
        totalStructuralErrors: 0,
      });
    });

    it('should keep going past an unreadable file', async () => {
      const missing = join(tempDir, 'missing.properties');
      const good = writeProperties('good.properties', 'acks=all\n');

      const batch = await new ValidationEngine(createCatalogue(), { concurrency: 1 }).validateFiles([missing, good]);

      expect(batch.reports).toHaveLength(2);
      expect(batch.reports[0]).toEqual({
        file: missing,
        profile: '',
        violations: [],
        parseErrors: [],
        fileError: { code: ErrorCodes.FILE_NOT_READABLE, message: `Cannot read properties file: ${missing}` },
        evaluated: 0,
        skipped: [],
        passed: true,
      });
      expect(isClean(batch.reports[0])).toBe(false);
      expect(batch.summary.failed).toBe(1);
      expect(batch.summary.totalStructuralErrors).toBe(1);
      expect(batch.reports[1].file).toBe(good);
    });

    it('should count parse errors once per file', async () => {
      const file = writeProperties('broken.properties', 'acks=all\nnot a pair\n%prod.standby=1\n');

      const batch = await new ValidationEngine(createCatalogue(), { allProfiles: true }).validateFiles([file]);

      expect(batch.reports.map((r) => r.profile)).toEqual(['', 'prod']);
      expect(batch.summary).toMatchObject({ reports: 2, failed: 2, totalViolations: 0, totalStructuralErrors: 1 });
    });

    it('should keep input order across batches', async () => {
      const files = ['a', 'b', 'c', 'd', 'e'].map((name) => writeProperties(`${name}.properties`, 'acks=all'));

      const batch = await new ValidationEngine(createCatalogue(), { concurrency: 2 }).validateFiles(files);

      expect(batch.reports.map((r) => r.file)).toEqual(files);
    });

    it('should read relative paths from the project root and report them as given', async () => {
      writeProperties('app.properties', 'acks=1');

      const engine = new ValidationEngine(createCatalogue(), { projectRoot: tempDir });
      const batch = await engine.validateFiles(['app.properties']);

      expect(batch.reports).toHaveLength(1);
      expect(batch.reports[0].file).toBe('app.properties');
      expect(batch.reports[0].violations.map((v) => v.ruleId)).toEqual(['producer-acks']);
    });
  });
});
