/**
 * Validates many properties files, each under one or more profiles.
 */
import os from 'node:os';
import * as path from 'node:path';
import { loadPropertyFile, type PropertyStore } from '../properties/store.js';
import { BASE_PROFILE } from '../properties/types.js';
import type { RuleCatalogue } from '../rules/catalogue.js';
import { PropCheckError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { validate, isClean } from './validator.js';
import type { BatchReport, Report } from './types.js';

export interface ValidationEngineOptions {
  /** Profiles to validate under. Defaults to the base profile only */
  profiles?: string[];
  /** Also validate every profile that appears in each file */
  allProfiles?: boolean;
  /** Files validated at once. Defaults to 75% of CPUs, min 2, max 16 */
  concurrency?: number;
  /** Directory relative file paths are read from. Defaults to the working directory */
  projectRoot?: string;
}

/** Validation engine that runs one catalogue over many files. */
export class ValidationEngine {
  private readonly catalogue: RuleCatalogue;
  private readonly options: ValidationEngineOptions;
  private readonly log = logger.child('engine');

  constructor(catalogue: RuleCatalogue, options: ValidationEngineOptions = {}) {
    this.catalogue = catalogue;
    this.options = options;
  }

  /**
   * Profiles to validate a store under, in a stable order without duplicates.
   */
  profilesFor(store: PropertyStore): string[] {
    const requested = this.options.profiles && this.options.profiles.length > 0
      ? this.options.profiles
      : [BASE_PROFILE];
    const profiles = new Set(requested);
    if (this.options.allProfiles) {
      profiles.add(BASE_PROFILE);
      for (const profile of store.profiles()) profiles.add(profile);
    }
    return [...profiles];
  }

  validateStore(store: PropertyStore): Report[] {
    return this.profilesFor(store).map((profile) => {
      const report = validate(store, profile, this.catalogue);
      this.log.debug(`${store.source ?? '(text)'} [${profile || 'base'}]: ${report.violations.length} violation(s), ${report.skipped.length} skipped`);
      return report;
    });
  }

  /** Validate a single file under every selected profile. */
  async validateFile(filePath: string): Promise<Report[]> {
    const fullPath = path.resolve(this.options.projectRoot ?? process.cwd(), filePath);
    const store = await loadPropertyFile(fullPath, filePath);
    return this.validateStore(store);
  }

  /** Validate multiple files. */
  async validateFiles(filePaths: string[]): Promise<BatchReport> {
    const reports: Report[] = [];

    // One unreadable file must not stop the rest of the batch
    const concurrency = this.options.concurrency ??
      Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
    for (let i = 0; i < filePaths.length; i += concurrency) {
      const batch = filePaths.slice(i, i + concurrency);
      const batchResults = await Promise.allSettled(batch.map((fp) => this.validateFile(fp)));

      for (let j = 0; j < batchResults.length; j++) {
        const result = batchResults[j];
        if (result.status === 'fulfilled') {
          reports.push(...result.value);
        } else {
          reports.push(this.createFileErrorReport(batch[j], result.reason));
        }
      }
    }

    // Reports of one file share its parse errors; count them once per file
    const structuralByFile = new Map<string, number>();
    for (const report of reports) {
      structuralByFile.set(report.file ?? '', report.parseErrors.length + (report.fileError ? 1 : 0));
    }

    const summary = {
      files: filePaths.length,
      reports: reports.length,
      passed: reports.filter(isClean).length,
      failed: reports.filter((r) => !isClean(r)).length,
      totalViolations: reports.reduce((sum, r) => sum + r.violations.length, 0),
      totalStructuralErrors: [...structuralByFile.values()].reduce((sum, n) => sum + n, 0),
    };

    return { reports, summary };
  }

  private createFileErrorReport(file: string, reason: unknown): Report {
    const code = reason instanceof PropCheckError ? reason.code : ErrorCodes.FILE_NOT_READABLE;
    const message = reason instanceof Error ? reason.message : String(reason);
    this.log.debug(`Failed to validate ${file}: ${message}`);
    return {
      file,
      profile: BASE_PROFILE,
      violations: [],
      parseErrors: [],
      fileError: { code, message },
      evaluated: 0,
      skipped: [],
      passed: true,
    };
  }
}
