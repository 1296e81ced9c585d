/**
 * Ordered, append-only collection of validated rules.
 */
import { RuleSchema, type Rule, type RuleDefinition } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { getEvaluator } from './registry.js';
import { CatalogueError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { formatList } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';

/** Profiles exempt from rules that declare no `exclude` list of their own. */
export const DEFAULT_EXCLUDED_PROFILES: readonly string[] = ['dev', 'test'];

export interface CatalogueEntry {
  /** Registration order, starting at 0 */
  readonly index: number;
  readonly rule: Rule;
}

export interface RuleCatalogueOptions {
  defaultExcludedProfiles?: readonly string[];
}

/**
 * The set of rules evaluated in one run, in registration order.
 *
 * Definitions are validated and compiled when registered, so a broken rule
 * fails here with a CatalogueError instead of during evaluation. New rules
 * are added through `register`; the validator and store never change.
 */
export class RuleCatalogue {
  readonly defaultExcludedProfiles: readonly string[];
  private readonly items: CatalogueEntry[] = [];
  private readonly byId = new Map<string, CatalogueEntry>();
  private readonly log = logger.child('catalogue');

  constructor(options: RuleCatalogueOptions = {}) {
    this.defaultExcludedProfiles = [...(options.defaultExcludedProfiles ?? DEFAULT_EXCLUDED_PROFILES)];
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Validate, compile and append a rule.
   */
  register(definition: RuleDefinition): this {
    const parsed = RuleSchema.safeParse(definition);
    if (!parsed.success) {
      const id = definition.id || '(unnamed)';
      throw new CatalogueError(
        ErrorCodes.INVALID_CATALOGUE,
        `Invalid rule definition '${id}': ${formatZodError(parsed.error)}`,
        { ruleId: id, errors: parsed.error.issues }
      );
    }

    const rule = parsed.data;
    if (this.byId.has(rule.id)) {
      throw new CatalogueError(
        ErrorCodes.INVALID_CATALOGUE,
        `Duplicate rule id '${rule.id}'`,
        { ruleId: rule.id }
      );
    }

    getEvaluator(rule.type).prepare(rule);

    const unreachable = this.unreachableProfiles(rule);
    if (unreachable.length > 0) {
      this.log.warn(
        `Rule '${rule.id}' includes ${formatList(unreachable)}, which the default exclusions drop; add 'exclude: []' to check them`
      );
    }

    const entry: CatalogueEntry = Object.freeze({ index: this.items.length, rule });
    this.items.push(entry);
    this.byId.set(rule.id, entry);
    return this;
  }

  registerAll(definitions: readonly RuleDefinition[]): this {
    for (const definition of definitions) {
      this.register(definition);
    }
    return this;
  }

  get(id: string): CatalogueEntry | undefined {
    return this.byId.get(id);
  }

  entries(): readonly CatalogueEntry[] {
    return this.items;
  }

  /**
   * Whether a rule is in scope for a profile.
   */
  appliesTo(rule: Rule, profile: string): boolean {
    const include = rule.profiles?.include;
    if (include && !include.includes(profile)) {
      return false;
    }
    const exclude = rule.profiles?.exclude ?? this.defaultExcludedProfiles;
    return !exclude.includes(profile);
  }

  /** Included profiles the default exclusion list removes again. */
  private unreachableProfiles(rule: Rule): string[] {
    const scope = rule.profiles;
    if (!scope?.include || scope.exclude) {
      return [];
    }
    return scope.include.filter((profile) => this.defaultExcludedProfiles.includes(profile));
  }

  /**
   * Evaluate one entry. Never throws: an evaluator failure becomes an
   * `evaluation_error` violation.
   */
  evaluate(entry: CatalogueEntry, context: Omit<EvaluationContext, 'ruleIndex'>): Violation | null {
    const { rule, index } = entry;
    try {
      return getEvaluator(rule.type).evaluate(rule, { ...context, ruleIndex: index });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        code: ErrorCodes.EVALUATION_ERROR,
        ruleId: rule.id,
        ruleType: rule.type,
        kind: 'evaluation_error',
        key: primaryKey(rule),
        keys: ruleKeys(rule),
        expected: 'rule evaluation to complete',
        actual: null,
        profile: context.profile,
        line: null,
        message: `Rule '${rule.id}' failed to evaluate: ${message}`,
        index,
      };
    }
  }
}

/**
 * The key a rule is reported against when no violation-specific key exists.
 */
export function primaryKey(rule: Rule): string {
  switch (rule.type) {
    case 'ratio_or_ordering':
      return rule.left;
    case 'mutual_exclusivity':
      return rule.keys[0];
    default:
      return rule.key;
  }
}

/**
 * Every key a rule reads.
 */
export function ruleKeys(rule: Rule): string[] {
  switch (rule.type) {
    case 'ratio_or_ordering':
      return [rule.left, rule.right];
    case 'mutual_exclusivity':
      return [...rule.keys];
    case 'conditional_range':
      return [rule.guard_key, rule.key];
    default:
      return [rule.key];
  }
}
