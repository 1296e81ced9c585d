import { describe, it, expect } from 'vitest';
import { RegexMatchEvaluator } from '../../../../src/core/rules/regex-match.js';
import { RegexMatchRuleSchema } from '../../../../src/core/rules/schema.js';
import { PropertyStore } from '../../../../src/core/properties/store.js';
import { CatalogueError } from '../../../../src/utils/errors.js';
import type { EvaluationContext } from '../../../../src/core/rules/types.js';

const createContext = (text: string, profile = ''): EvaluationContext => ({
  store: PropertyStore.load(text),
  profile,
  ruleIndex: 0,
});

describe('RegexMatchEvaluator', () => {
  const evaluator = new RegexMatchEvaluator();
  const rule = RegexMatchRuleSchema.parse({
    type: 'regex_match',
    id: 'app-id',
    key: 'kafka-streams.application-id',
    pattern: '[a-z][a-z0-9-]*',
  });
  evaluator.prepare(rule);

  it('should describe the pattern', () => {
    expect(evaluator.describe(rule)).toBe('value matching /[a-z][a-z0-9-]*/');
  });

  it('should pass on a full match', () => {
    expect(evaluator.evaluate(rule, createContext('kafka-streams.application-id=orders-v2'))).toBeNull();
  });

  it('should require the whole value to match', () => {
    const violation = evaluator.evaluate(rule, createContext('kafka-streams.application-id=orders_v2'));

    expect(violation).toMatchObject({
      code: 'R005',
      actual: 'orders_v2',
      message: "kafka-streams.application-id is set to 'orders_v2', which does not match /[a-z][a-z0-9-]*/",
    });
  });

  it('should anchor alternations as a whole', () => {
    const alternation = RegexMatchRuleSchema.parse({ type: 'regex_match', id: 'alt', key: 'mode', pattern: 'a|b' });
    evaluator.prepare(alternation);

    expect(evaluator.evaluate(alternation, createContext('mode=b'))).toBeNull();
    expect(evaluator.evaluate(alternation, createContext('mode=ab'))).not.toBeNull();
  });

  it('should honour flags and ignore the global flag', () => {
    const insensitive = RegexMatchRuleSchema.parse({
      type: 'regex_match', id: 'ci', key: 'protocol', pattern: 'sasl_ssl', flags: 'gi',
    });
    evaluator.prepare(insensitive);
    const context = createContext('protocol=SASL_SSL');

    expect(evaluator.evaluate(insensitive, context)).toBeNull();
    expect(evaluator.evaluate(insensitive, context)).toBeNull();
  });

  it('should pass when absent unless required', () => {
    expect(evaluator.evaluate(rule, createContext(''))).toBeNull();

    const required = RegexMatchRuleSchema.parse({ type: 'regex_match', id: 'r', key: 'k', pattern: '\\d+', required: true });
    expect(evaluator.evaluate(required, createContext(''))?.message).toBe('k is not set, expected value matching /\\d+/');
  });

  it('should reject a pattern that does not compile', () => {
    const broken = RegexMatchRuleSchema.parse({ type: 'regex_match', id: 'broken', key: 'k', pattern: '(unclosed' });

    expect(() => evaluator.prepare(broken)).toThrow(CatalogueError);
    expect(() => evaluator.prepare(broken)).toThrow(/^Rule 'broken' \(regex_match\) is invalid: pattern \/\(unclosed\/ does not compile/);
  });
});
