import type { ExactValueRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * Requires a key to be set to one exact, case-sensitive value.
 * An absent key fails. Error code: R001
 */
export class ExactValueEvaluator extends BaseRuleEvaluator<ExactValueRule> {
  readonly type = 'exact_value' as const;
  readonly errorCode = ErrorCodes.EXACT_VALUE;

  describe(rule: ExactValueRule): string {
    return rule.expected;
  }

  evaluate(rule: ExactValueRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);

    if (actual === undefined) {
      return this.createViolation(rule, context, {
        key: rule.key,
        actual: null,
        message: `${rule.key} is not set, expected '${rule.expected}'`,
      });
    }

    if (actual !== rule.expected) {
      return this.createViolation(rule, context, {
        key: rule.key,
        actual,
        message: `${rule.key} is set to '${actual}', expected '${rule.expected}'`,
      });
    }

    return null;
  }
}
