/**
 * Rule definition schemas. A rule is a tagged union discriminated by `type`.
 */
import { z } from 'zod';

/**
 * Values are compared as written. YAML turns unquoted `1.0` or `True` into a
 * number or boolean and loses that text, so those must be quoted.
 */
const ValueSchema = z.string({
  error: (issue) =>
    issue.input === undefined
      ? undefined
      : `expected a string, quote numbers and booleans so they are compared as written (e.g. "1.0", "true")`,
});

const KeySchema = z.string().min(1);

/**
 * Profiles a rule applies to. Without `exclude` the catalogue default is used,
 * so a rule meant for a default-excluded profile (`include: [dev]`) also needs
 * `exclude: []`. Registration warns about that combination.
 */
export const ProfileScopeSchema = z.object({
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
});

/**
 * `exact` reads the key itself. `suffix` reads the first visible key that is
 * the rule key or ends with `.<key>`, so `kafka.security.protocol` also
 * matches `mp.messaging.incoming.orders.kafka.security.protocol`.
 */
export const KeyMatchSchema = z.enum(['exact', 'suffix']);

const ruleBase = {
  id: z.string().min(1),
  match: KeyMatchSchema.default('exact'),
  why: z.string().optional(),
  profiles: ProfileScopeSchema.optional(),
};

const rangeBounds = {
  min: z.number().optional(),
  max: z.number().optional(),
  inclusive: z.boolean().default(true),
};

export const ExactValueRuleSchema = z.object({
  type: z.literal('exact_value'),
  ...ruleBase,
  key: KeySchema,
  expected: ValueSchema,
});

export const OptionalExactValueRuleSchema = z.object({
  type: z.literal('optional_exact_value'),
  ...ruleBase,
  key: KeySchema,
  expected: ValueSchema,
});

export const OneOfRuleSchema = z.object({
  type: z.literal('one_of'),
  ...ruleBase,
  key: KeySchema,
  allowed: z.array(ValueSchema).min(1),
  required: z.boolean().default(false),
});

export const NumericRangeRuleSchema = z.object({
  type: z.literal('numeric_range'),
  ...ruleBase,
  key: KeySchema,
  ...rangeBounds,
  required: z.boolean().default(false),
});

export const RegexMatchRuleSchema = z.object({
  type: z.literal('regex_match'),
  ...ruleBase,
  key: KeySchema,
  pattern: z.string(),
  flags: z.string().optional(),
  required: z.boolean().default(false),
});

export const OrderingOperatorSchema = z.enum(['gt', 'gte', 'lt', 'lte', 'eq', 'ne']);

/**
 * `left OP right`, or `right` within `[left * min, left * max]` for `ratio`.
 */
export const ComparisonSchema = z.union([
  z.object({ op: OrderingOperatorSchema }),
  z.object({ op: z.literal('ratio'), min: z.number(), max: z.number() }),
]);

export const RatioOrOrderingRuleSchema = z.object({
  type: z.literal('ratio_or_ordering'),
  ...ruleBase,
  left: KeySchema,
  right: KeySchema,
  left_default: z.number().optional(),
  right_default: z.number().optional(),
  comparison: ComparisonSchema,
});

export const MutualExclusivityRuleSchema = z.object({
  type: z.literal('mutual_exclusivity'),
  ...ruleBase,
  keys: z
    .array(KeySchema)
    .min(2)
    .refine((keys) => new Set(keys).size === keys.length, { message: 'keys must be unique' }),
  require_exactly_one: z.boolean().default(false),
});

export const ConditionalRangeRuleSchema = z.object({
  type: z.literal('conditional_range'),
  ...ruleBase,
  guard_key: KeySchema,
  guard_value: ValueSchema,
  key: KeySchema,
  ...rangeBounds,
});

export const MustBeAbsentRuleSchema = z.object({
  type: z.literal('must_be_absent'),
  ...ruleBase,
  key: KeySchema,
  allowed_values: z.array(ValueSchema).default([]),
});

export const RuleSchema = z.discriminatedUnion('type', [
  ExactValueRuleSchema,
  OptionalExactValueRuleSchema,
  OneOfRuleSchema,
  NumericRangeRuleSchema,
  RegexMatchRuleSchema,
  RatioOrOrderingRuleSchema,
  MutualExclusivityRuleSchema,
  ConditionalRangeRuleSchema,
  MustBeAbsentRuleSchema,
]);

/** Top-level shape of a rule catalogue YAML file. An empty file has no rules. */
export const CatalogueFileSchema = z.preprocess(
  (val) => val ?? {},
  z.object({
    rules: z.array(RuleSchema).default([]),
  })
);

/** A validated rule, defaults applied. */
export type Rule = z.output<typeof RuleSchema>;
/** A rule as written by hand or in YAML, before defaults. */
export type RuleDefinition = z.input<typeof RuleSchema>;
export type RuleType = Rule['type'];
export type RuleOfType<T extends RuleType> = Extract<Rule, { type: T }>;
export type ProfileScope = z.output<typeof ProfileScopeSchema>;
export type KeyMatch = z.output<typeof KeyMatchSchema>;
export type Comparison = z.output<typeof ComparisonSchema>;
export type OrderingOperator = z.output<typeof OrderingOperatorSchema>;

export type ExactValueRule = RuleOfType<'exact_value'>;
export type OptionalExactValueRule = RuleOfType<'optional_exact_value'>;
export type OneOfRule = RuleOfType<'one_of'>;
export type NumericRangeRule = RuleOfType<'numeric_range'>;
export type RegexMatchRule = RuleOfType<'regex_match'>;
export type RatioOrOrderingRule = RuleOfType<'ratio_or_ordering'>;
export type MutualExclusivityRule = RuleOfType<'mutual_exclusivity'>;
export type ConditionalRangeRule = RuleOfType<'conditional_range'>;
export type MustBeAbsentRule = RuleOfType<'must_be_absent'>;
