import type { ConditionalRangeRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import { formatRange } from '../../utils/format.js';
import { isWithinRange, parseInteger } from './numeric.js';

/**
 * Applies an integer range to `key` only while `guard_key` equals `guard_value`.
 * Under an active guard the target must be set. Error code: R008
 */
export class ConditionalRangeEvaluator extends BaseRuleEvaluator<ConditionalRangeRule> {
  readonly type = 'conditional_range' as const;
  readonly errorCode = ErrorCodes.CONDITIONAL_RANGE;

  prepare(rule: ConditionalRangeRule): void {
    if (rule.min !== undefined && rule.max !== undefined && rule.min > rule.max) {
      throw this.invalidDefinition(rule, `min ${rule.min} is greater than max ${rule.max}`);
    }
  }

  describe(rule: ConditionalRangeRule): string {
    return `integer in ${formatRange(rule.min, rule.max, rule.inclusive)} when ${rule.guard_key}=${rule.guard_value}`;
  }

  evaluate(rule: ConditionalRangeRule, context: EvaluationContext): Violation | null {
    const guard = this.resolve(rule, context, rule.guard_key);
    if (guard !== rule.guard_value) {
      return null;
    }

    const keys = [rule.guard_key, rule.key];
    const actual = this.resolve(rule, context, rule.key);

    if (actual === undefined) {
      return this.createViolation(rule, context, {
        key: rule.key,
        keys,
        actual: null,
        message: `${rule.key} must be set when ${rule.guard_key} is '${rule.guard_value}'`,
      });
    }

    const value = parseInteger(actual);
    if (value === null) {
      return this.malformed(rule, context, rule.key, actual, 'an integer');
    }

    if (isWithinRange(value, rule.min, rule.max, rule.inclusive)) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.key,
      keys,
      actual,
      message: `${rule.key} is ${actual}, outside of ${formatRange(rule.min, rule.max, rule.inclusive)}, which applies when ${rule.guard_key} is '${rule.guard_value}'`,
    });
  }
}
