import type { OneOfRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * Restricts a key to an enumerated set of values.
 * Absence passes unless the rule is `required`. Error code: R003
 */
export class OneOfEvaluator extends BaseRuleEvaluator<OneOfRule> {
  readonly type = 'one_of' as const;
  readonly errorCode = ErrorCodes.ONE_OF;

  describe(rule: OneOfRule): string {
    return `one of [${rule.allowed.join(', ')}]`;
  }

  evaluate(rule: OneOfRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);

    if (actual === undefined) {
      if (!rule.required) return null;
      return this.createViolation(rule, context, {
        key: rule.key,
        actual: null,
        message: `${rule.key} is not set, expected ${this.describe(rule)}`,
      });
    }

    if (rule.allowed.includes(actual)) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.key,
      actual,
      message: `${rule.key} is set to '${actual}', expected ${this.describe(rule)}`,
    });
  }
}
