import type { NumericRangeRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import { formatRange } from '../../utils/format.js';
import { isWithinRange, parseInteger } from './numeric.js';

/**
 * Requires an integer value within bounds. Missing bounds are unbounded.
 * Absence passes unless the rule is `required`. Error code: R004
 */
export class NumericRangeEvaluator extends BaseRuleEvaluator<NumericRangeRule> {
  readonly type = 'numeric_range' as const;
  readonly errorCode = ErrorCodes.NUMERIC_RANGE;

  prepare(rule: NumericRangeRule): void {
    if (rule.min !== undefined && rule.max !== undefined && rule.min > rule.max) {
      throw this.invalidDefinition(rule, `min ${rule.min} is greater than max ${rule.max}`);
    }
  }

  describe(rule: NumericRangeRule): string {
    return `integer in ${formatRange(rule.min, rule.max, rule.inclusive)}`;
  }

  evaluate(rule: NumericRangeRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);

    if (actual === undefined) {
      if (!rule.required) return null;
      return this.createViolation(rule, context, {
        key: rule.key,
        actual: null,
        message: `${rule.key} is not set, expected ${this.describe(rule)}`,
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
      actual,
      message: `${rule.key} is ${actual}, outside of ${formatRange(rule.min, rule.max, rule.inclusive)}`,
    });
  }
}
