import { describe, it, expect } from 'vitest';
import { ConditionalRangeEvaluator } from '../../../../src/core/rules/conditional-range.js';
import { ConditionalRangeRuleSchema } from '../../../../src/core/rules/schema.js';
import { PropertyStore } from '../../../../src/core/properties/store.js';
import type { EvaluationContext } from '../../../../src/core/rules/types.js';

const createContext = (text: string, profile = ''): EvaluationContext => ({
  store: PropertyStore.load(text),
  profile,
  ruleIndex: 0,
});

describe('ConditionalRangeEvaluator', () => {
  const evaluator = new ConditionalRangeEvaluator();
  const rule = ConditionalRangeRuleSchema.parse({
    type: 'conditional_range',
    id: 'eos-threads',
    guard_key: 'processing.guarantee',
    guard_value: 'exactly_once_v2',
    key: 'num.stream.threads',
    min: 1,
    max: 4,
  });

  it('should describe range and guard', () => {
    expect(evaluator.describe(rule)).toBe('integer in [1, 4] when processing.guarantee=exactly_once_v2');
  });

  it('should not apply while the guard does not match', () => {
    expect(evaluator.evaluate(rule, createContext('processing.guarantee=at_least_once\nnum.stream.threads=99'))).toBeNull();
    expect(evaluator.evaluate(rule, createContext('num.stream.threads=99'))).toBeNull();
  });

  it('should pass within range under the guard', () => {
    expect(evaluator.evaluate(rule, createContext('processing.guarantee=exactly_once_v2\nnum.stream.threads=2'))).toBeNull();
  });

  it('should report an out-of-range target', () => {
    const violation = evaluator.evaluate(rule, createContext('processing.guarantee=exactly_once_v2\nnum.stream.threads=8'));

    expect(violation).toMatchObject({
      code: 'R008',
      key: 'num.stream.threads',
      keys: ['processing.guarantee', 'num.stream.threads'],
      actual: '8',
      line: 2,
      message: "num.stream.threads is 8, outside of [1, 4], which applies when processing.guarantee is 'exactly_once_v2'",
    });
  });

  it('should require the target under the guard', () => {
    const violation = evaluator.evaluate(rule, createContext('processing.guarantee=exactly_once_v2'));

    expect(violation?.actual).toBeNull();
    expect(violation?.message).toBe("num.stream.threads must be set when processing.guarantee is 'exactly_once_v2'");
  });

  it('should report a non-integer target as malformed', () => {
    const violation = evaluator.evaluate(rule, createContext('processing.guarantee=exactly_once_v2\nnum.stream.threads=two'));

    expect(violation?.kind).toBe('malformed_value');
    expect(violation?.code).toBe('R100');
  });

  it('should reject an unquoted boolean guard value', () => {
    const result = ConditionalRangeRuleSchema.safeParse({
      type: 'conditional_range', id: 'flag', guard_key: 'cache.enabled', guard_value: true, key: 'cache.size', min: 1,
    });

    expect(result.success).toBe(false);
  });

  it('should match a quoted guard value as written', () => {
    const flag = ConditionalRangeRuleSchema.parse({
      type: 'conditional_range', id: 'flag', guard_key: 'cache.enabled', guard_value: 'true', key: 'cache.size', min: 1,
    });

    expect(evaluator.evaluate(flag, createContext('cache.enabled=true\ncache.size=0'))?.actual).toBe('0');
  });
});
