import type { MutualExclusivityRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * At most one key of a set may be set; with `require_exactly_one`, exactly one.
 * Error code: R007
 */
export class MutualExclusivityEvaluator extends BaseRuleEvaluator<MutualExclusivityRule> {
  readonly type = 'mutual_exclusivity' as const;
  readonly errorCode = ErrorCodes.MUTUAL_EXCLUSIVITY;

  describe(rule: MutualExclusivityRule): string {
    return `${rule.require_exactly_one ? 'exactly' : 'at most'} one of [${rule.keys.join(', ')}]`;
  }

  evaluate(rule: MutualExclusivityRule, context: EvaluationContext): Violation | null {
    const present = rule.keys.filter((key) => this.lookup(rule, context, key) !== undefined);

    if (present.length > 1) {
      return this.createViolation(rule, context, {
        key: present[0],
        keys: rule.keys,
        actual: present
          .map((key) => `${key}=${this.resolve(rule, context, key) ?? ''}`)
          .join(', '),
        line: this.lookup(rule, context, present[1])?.lineNumber ?? null,
        message: `${present.join(' and ')} are all set, but only one of [${rule.keys.join(', ')}] may be set`,
      });
    }

    if (present.length === 0 && rule.require_exactly_one) {
      return this.createViolation(rule, context, {
        key: rule.keys[0],
        keys: rule.keys,
        actual: null,
        line: null,
        message: `None of [${rule.keys.join(', ')}] is set, one of them must be set`,
      });
    }

    return null;
  }
}
