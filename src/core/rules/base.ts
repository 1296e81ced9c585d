/**
 * Shared plumbing for rule evaluators.
 */
import type { PropertyEntry } from '../properties/types.js';
import type { Rule } from './schema.js';
import type { EvaluationContext, IRuleEvaluator, Violation, ViolationKind } from './types.js';
import { CatalogueError, ErrorCodes } from '../../utils/errors.js';
import { formatActual } from '../../utils/format.js';

export interface ViolationOptions {
  key: string;
  keys?: string[];
  actual: string | null;
  message?: string;
  kind?: ViolationKind;
  /** Defaults to the line of `key` as resolved under the active profile */
  line?: number | null;
}

/**
 * Base class for rule evaluators.
 */
export abstract class BaseRuleEvaluator<R extends Rule> implements IRuleEvaluator<R> {
  abstract readonly type: R['type'];
  abstract readonly errorCode: string;

  prepare(_rule: R): void {}

  abstract describe(rule: R): string;

  abstract evaluate(rule: R, context: EvaluationContext): Violation | null;

  protected createViolation(rule: R, context: EvaluationContext, options: ViolationOptions): Violation {
    const kind = options.kind ?? 'constraint';
    const expected = this.describe(rule);
    const line = options.line !== undefined
      ? options.line
      : this.lookup(rule, context, options.key)?.lineNumber ?? null;

    const violation: Violation = {
      code: kind === 'malformed_value' ? ErrorCodes.MALFORMED_VALUE : this.errorCode,
      ruleId: rule.id,
      ruleType: rule.type,
      kind,
      key: options.key,
      keys: options.keys ?? [options.key],
      expected,
      actual: options.actual,
      profile: context.profile,
      line,
      message: options.message ?? `${options.key} is ${formatActual(options.actual)}, expected ${expected}`,
      index: context.ruleIndex,
    };

    if (rule.why) {
      violation.why = rule.why;
    }

    return violation;
  }

  /**
   * The entry a rule reads for `key` under the active profile, by exact key
   * or by suffix depending on the rule's `match`.
   */
  protected lookup(rule: R, context: EvaluationContext, key: string): PropertyEntry | undefined {
    return rule.match === 'suffix'
      ? context.store.findBySuffix(context.profile, key)
      : context.store.lookup(context.profile, key);
  }

  protected resolve(rule: R, context: EvaluationContext, key: string): string | undefined {
    return this.lookup(rule, context, key)?.rawValue;
  }

  protected malformed(rule: R, context: EvaluationContext, key: string, actual: string, what: string): Violation {
    return this.createViolation(rule, context, {
      key,
      actual,
      kind: 'malformed_value',
      message: `${key} is '${actual}', which is not ${what}`,
    });
  }

  protected invalidDefinition(rule: R, reason: string): CatalogueError {
    return new CatalogueError(
      ErrorCodes.INVALID_CATALOGUE,
      `Rule '${rule.id}' (${rule.type}) is invalid: ${reason}`,
      { ruleId: rule.id, type: rule.type }
    );
  }
}
