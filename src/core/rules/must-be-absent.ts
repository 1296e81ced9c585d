import type { MustBeAbsentRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * Keeps a key at its library default: it must be unset, or set to one of
 * `allowed_values`. Error code: R009
 */
export class MustBeAbsentEvaluator extends BaseRuleEvaluator<MustBeAbsentRule> {
  readonly type = 'must_be_absent' as const;
  readonly errorCode = ErrorCodes.MUST_BE_ABSENT;

  describe(rule: MustBeAbsentRule): string {
    if (rule.allowed_values.length === 0) {
      return 'not set';
    }
    return `not set, or one of [${rule.allowed_values.join(', ')}]`;
  }

  evaluate(rule: MustBeAbsentRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);
    if (actual === undefined || rule.allowed_values.includes(actual)) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.key,
      actual,
      message: `Expected ${rule.key} to not be set. It is set to '${actual}'`,
    });
  }
}
