import type { OrderingOperator, RatioOrOrderingRule } from './schema.js';
import type { EvaluationContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import { parseDecimal } from './numeric.js';

const OPERATORS: Record<OrderingOperator, { symbol: string; test: (a: number, b: number) => boolean }> = {
  gt: { symbol: '>', test: (a, b) => a > b },
  gte: { symbol: '>=', test: (a, b) => a >= b },
  lt: { symbol: '<', test: (a, b) => a < b },
  lte: { symbol: '<=', test: (a, b) => a <= b },
  eq: { symbol: '==', test: (a, b) => a === b },
  ne: { symbol: '!=', test: (a, b) => a !== b },
};

interface Operand {
  key: string;
  /** Value as written, or the rule's default rendered as a string */
  raw: string;
  fromDefault: boolean;
}

/**
 * Compares two numeric keys, either by ordering (`left > right`) or by
 * ratio (`right` within `[left * min, left * max]`).
 *
 * An absent key falls back to the rule's explicit default. If a side is still
 * missing there is nothing to compare and the rule passes. Error code: R006
 */
export class RatioOrOrderingEvaluator extends BaseRuleEvaluator<RatioOrOrderingRule> {
  readonly type = 'ratio_or_ordering' as const;
  readonly errorCode = ErrorCodes.RATIO_OR_ORDERING;

  prepare(rule: RatioOrOrderingRule): void {
    const { comparison } = rule;
    if (comparison.op === 'ratio' && comparison.min > comparison.max) {
      throw this.invalidDefinition(rule, `ratio min ${comparison.min} is greater than max ${comparison.max}`);
    }
  }

  describe(rule: RatioOrOrderingRule): string {
    const { comparison } = rule;
    if (comparison.op === 'ratio') {
      return `${rule.right} within [${comparison.min}x, ${comparison.max}x] of ${rule.left}`;
    }
    return `${rule.left} ${OPERATORS[comparison.op].symbol} ${rule.right}`;
  }

  evaluate(rule: RatioOrOrderingRule, context: EvaluationContext): Violation | null {
    const left = this.resolveOperand(rule, context, rule.left, rule.left_default);
    const right = this.resolveOperand(rule, context, rule.right, rule.right_default);
    if (!left || !right) {
      return null;
    }

    const leftValue = parseDecimal(left.raw);
    if (leftValue === null) {
      return this.malformed(rule, context, left.key, left.raw, 'a number');
    }
    const rightValue = parseDecimal(right.raw);
    if (rightValue === null) {
      return this.malformed(rule, context, right.key, right.raw, 'a number');
    }

    const { comparison } = rule;
    const keys = [rule.left, rule.right];
    const actual = `${this.label(left)}, ${this.label(right)}`;

    if (comparison.op === 'ratio') {
      const lower = leftValue * comparison.min;
      const upper = leftValue * comparison.max;
      if (rightValue >= lower && rightValue <= upper) {
        return null;
      }
      return this.createViolation(rule, context, {
        key: rule.right,
        keys,
        actual,
        line: this.lineOf(rule, context, right),
        message: `${rule.right} is ${rightValue}, outside of [${lower}, ${upper}] based on ${rule.left} = ${leftValue}`,
      });
    }

    const operator = OPERATORS[comparison.op];
    if (operator.test(leftValue, rightValue)) {
      return null;
    }

    return this.createViolation(rule, context, {
      key: rule.left,
      keys,
      actual,
      line: this.lineOf(rule, context, left),
      message: `${rule.left} (${leftValue}) must be ${operator.symbol} ${rule.right} (${rightValue})`,
    });
  }

  private resolveOperand(
    rule: RatioOrOrderingRule,
    context: EvaluationContext,
    key: string,
    fallback: number | undefined
  ): Operand | null {
    const value = this.resolve(rule, context, key);
    if (value !== undefined) {
      return { key, raw: value, fromDefault: false };
    }
    if (fallback !== undefined) {
      return { key, raw: String(fallback), fromDefault: true };
    }
    return null;
  }

  private label(operand: Operand): string {
    return `${operand.key}=${operand.raw}${operand.fromDefault ? ' (default)' : ''}`;
  }

  private lineOf(rule: RatioOrOrderingRule, context: EvaluationContext, operand: Operand): number | null {
    if (operand.fromDefault) return null;
    return this.lookup(rule, context, operand.key)?.lineNumber ?? null;
  }
}
