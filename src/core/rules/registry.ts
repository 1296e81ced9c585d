/**
 * Rule evaluator registry - maps rule types to evaluators.
 *
 * The map is typed over every RuleType, so adding a variant to the schema
 * without an evaluator fails to compile.
 */
import type { Rule, RuleOfType, RuleType } from './schema.js';
import type { IRuleEvaluator } from './types.js';

import { ExactValueEvaluator } from './exact-value.js';
import { OptionalExactValueEvaluator } from './optional-exact-value.js';
import { OneOfEvaluator } from './one-of.js';
import { NumericRangeEvaluator } from './numeric-range.js';
import { RegexMatchEvaluator } from './regex-match.js';
import { RatioOrOrderingEvaluator } from './ratio-or-ordering.js';
import { MutualExclusivityEvaluator } from './mutual-exclusivity.js';
import { ConditionalRangeEvaluator } from './conditional-range.js';
import { MustBeAbsentEvaluator } from './must-be-absent.js';

type EvaluatorMap = { [T in RuleType]: IRuleEvaluator<RuleOfType<T>> };

const evaluatorRegistry: EvaluatorMap = {
  exact_value: new ExactValueEvaluator(),
  optional_exact_value: new OptionalExactValueEvaluator(),
  one_of: new OneOfEvaluator(),
  numeric_range: new NumericRangeEvaluator(),
  regex_match: new RegexMatchEvaluator(),
  ratio_or_ordering: new RatioOrOrderingEvaluator(),
  mutual_exclusivity: new MutualExclusivityEvaluator(),
  conditional_range: new ConditionalRangeEvaluator(),
  must_be_absent: new MustBeAbsentEvaluator(),
};

/**
 * Get the evaluator for a rule type.
 */
export function getEvaluator<T extends RuleType>(type: T): IRuleEvaluator<RuleOfType<T>> {
  return evaluatorRegistry[type];
}

export function getRuleTypes(): RuleType[] {
  return Object.keys(evaluatorRegistry).filter(isRuleType);
}

function isRuleType(value: string): value is RuleType {
  return Object.prototype.hasOwnProperty.call(evaluatorRegistry, value);
}

/**
 * Human-readable description of what a rule expects.
 */
export function describeRule(rule: Rule): string {
  return getEvaluator(rule.type).describe(rule);
}
