/**
 * Rule evaluator type definitions.
 */
import type { PropertyStore } from '../properties/store.js';
import type { Rule, RuleType } from './schema.js';

/**
 * `constraint` for a value that breaks the rule, `malformed_value` for input
 * the rule cannot interpret, `evaluation_error` when the evaluator itself threw.
 */
export type ViolationKind = 'constraint' | 'malformed_value' | 'evaluation_error';

/**
 * A single failed rule check.
 */
export interface Violation {
  /** Error code (R001, R100, etc.) */
  code: string;
  ruleId: string;
  ruleType: RuleType;
  kind: ViolationKind;
  /** The key the violation is reported against */
  key: string;
  /** Every key the rule reads */
  keys: string[];
  /** Human-readable description of the constraint */
  expected: string;
  /** Observed value, null when the key is absent */
  actual: string | null;
  /** Profile the rule was evaluated under */
  profile: string;
  /** Line of the offending entry (null if absent or not line-specific) */
  line: number | null;
  message: string;
  /** Explanation of why this rule exists */
  why?: string;
  /** Catalogue registration index of the rule */
  index: number;
}

/**
 * Context passed to rule evaluators.
 */
export interface EvaluationContext {
  store: PropertyStore;
  /** Active profile, '' for the base profile */
  profile: string;
  /** Registration index of the rule being evaluated */
  ruleIndex: number;
}

/**
 * Interface for rule evaluators. One evaluator per rule type.
 */
export interface IRuleEvaluator<R extends Rule = Rule> {
  readonly type: R['type'];
  readonly errorCode: string;

  /**
   * Check and precompile a definition when it is registered.
   * Throws CatalogueError for definitions that can never evaluate.
   */
  prepare(rule: R): void;

  /** Human-readable description of what the rule expects. */
  describe(rule: R): string;

  evaluate(rule: R, context: EvaluationContext): Violation | null;
}
