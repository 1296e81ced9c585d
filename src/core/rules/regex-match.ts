import type { RegexMatchRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * Requires the whole value to match a regular expression.
 * Patterns are compiled once, at registration. Error code: R005
 */
export class RegexMatchEvaluator extends BaseRuleEvaluator<RegexMatchRule> {
  readonly type = 'regex_match' as const;
  readonly errorCode = ErrorCodes.REGEX_MATCH;

  private readonly compiled = new WeakMap<RegexMatchRule, RegExp>();

  prepare(rule: RegexMatchRule): void {
    this.compiled.set(rule, this.compile(rule));
  }

  describe(rule: RegexMatchRule): string {
    return `value matching /${rule.pattern}/${rule.flags ?? ''}`;
  }

  evaluate(rule: RegexMatchRule, context: EvaluationContext): Violation | null {
    const actual = this.resolve(rule, context, rule.key);

    if (actual === undefined) {
      if (!rule.required) return null;
      return this.createViolation(rule, context, {
        key: rule.key,
        actual: null,
        message: `${rule.key} is not set, expected ${this.describe(rule)}`,
      });
    }

    const regex = this.compiled.get(rule) ?? this.compile(rule);
    if (regex.test(actual)) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.key,
      actual,
      message: `${rule.key} is set to '${actual}', which does not match /${rule.pattern}/`,
    });
  }

  private compile(rule: RegexMatchRule): RegExp {
    // Global and sticky flags make test() stateful
    const flags = (rule.flags ?? '').replace(/[gy]/g, '');
    try {
      return new RegExp(`^(?:${rule.pattern})$`, flags);
    } catch (error) {
      throw this.invalidDefinition(
        rule,
        `pattern /${rule.pattern}/ does not compile: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
