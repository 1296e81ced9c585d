import type { OptionalExactValueRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * Like exact_value, but leaving the key unset is acceptable.
 * Error code: R002
 */
export class OptionalExactValueEvaluator extends BaseRuleEvaluator<OptionalExactValueRule> {
  readonly type = 'optional_exact_value' as const;
  readonly errorCode = ErrorCodes.OPTIONAL_EXACT_VALUE;

  describe(rule: OptionalExactValueRule): string {
    return `${rule.expected} (or unset)`;
  }

  evaluate(rule: OptionalExactValueRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);
    if (actual === undefined || actual === rule.expected) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.key,
      actual,
      message: `${rule.key} is set to '${actual}', expected '${rule.expected}' or no value`,
    });
  }
}
