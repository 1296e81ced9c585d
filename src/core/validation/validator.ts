/**
 * Evaluates a rule catalogue against a property store.
 */
import type { PropertyStore } from '../properties/store.js';
import type { CatalogueEntry, RuleCatalogue } from '../rules/catalogue.js';
import type { Violation } from '../rules/types.js';
import type { ExitCodes, Report } from './types.js';

/**
 * Run every in-scope rule and collect all violations. Never stops at the
 * first failure; the returned report is the only output.
 */
export function validate(store: PropertyStore, activeProfile: string, catalogue: RuleCatalogue): Report {
  const { inScope, skipped } = partition(catalogue, activeProfile);
  const violations: Violation[] = [];

  for (const entry of inScope) {
    const violation = catalogue.evaluate(entry, { store, profile: activeProfile });
    if (violation) {
      violations.push(violation);
    }
  }

  return buildReport(store, activeProfile, violations, inScope.length, skipped);
}

/**
 * Same result as `validate`, evaluating rules as independent tasks and
 * restoring registration order afterwards.
 */
export async function validateConcurrently(
  store: PropertyStore,
  activeProfile: string,
  catalogue: RuleCatalogue
): Promise<Report> {
  const { inScope, skipped } = partition(catalogue, activeProfile);

  const results = await Promise.all(
    inScope.map(async (entry) => catalogue.evaluate(entry, { store, profile: activeProfile }))
  );
  const violations = results.filter((v): v is Violation => v !== null);

  return buildReport(store, activeProfile, violations, inScope.length, skipped);
}

/**
 * True when a report has neither violations nor structural errors.
 */
export function isClean(report: Report): boolean {
  return report.passed && report.parseErrors.length === 0 && report.fileError === undefined;
}

/**
 * Exit status for a set of reports: success only when every report is clean.
 */
export function getExitCode(reports: readonly Report[], exitCodes: ExitCodes): number {
  return reports.every(isClean) ? exitCodes.success : exitCodes.error;
}

function partition(catalogue: RuleCatalogue, profile: string): { inScope: CatalogueEntry[]; skipped: string[] } {
  const inScope: CatalogueEntry[] = [];
  const skipped: string[] = [];
  for (const entry of catalogue.entries()) {
    if (catalogue.appliesTo(entry.rule, profile)) {
      inScope.push(entry);
    } else {
      skipped.push(entry.rule.id);
    }
  }
  return { inScope, skipped };
}

function buildReport(
  store: PropertyStore,
  profile: string,
  violations: Violation[],
  evaluated: number,
  skipped: string[]
): Report {
  const ordered = [...violations].sort((a, b) => a.index - b.index);
  return {
    file: store.source ?? null,
    profile,
    violations: ordered,
    parseErrors: store.parseErrors,
    evaluated,
    skipped,
    passed: ordered.length === 0,
  };
}
