/**
 * Placement types
 */

/**
 * Label selector operators accepted by the Placement API
 */
export const LABEL_OPERATORS = ['In', 'NotIn', 'Exists', 'DoesNotExist'] as const;

export type LabelOperator = (typeof LABEL_OPERATORS)[number];

/**
 * Full label predicate form
 */
export interface FullLabelPredicate {
  key: string;
  /** Defaults to In */
  operator?: string;
  values?: string[];
}

/**
 * Shorthand label predicate form: `{ environment: ['dev', 'test'] }` or `{ environment: 'dev' }`
 */
export type ShorthandLabelPredicate = Record<string, string | string[]>;

/**
 * Label predicate as written by the user
 */
export type LabelPredicateInput = FullLabelPredicate | ShorthandLabelPredicate;

/**
 * Canonical match expression
 */
export interface NormalizedExpression {
  key: string;
  operator: LabelOperator;
  values: string[];
}

/**
 * Placement by cluster labels
 */
export interface SelectorPlacementRule {
  type: 'selector';
  matchLabels: Record<string, string>;
}

/**
 * Placement by named cluster sets, optionally filtered by label expressions
 */
export interface ClusterSetPlacementRule {
  type: 'clusterSet';
  clusterSets: string[];
  matchExpressions: NormalizedExpression[];
}

/**
 * Resolved, canonical targeting rule
 */
export type PlacementRule = SelectorPlacementRule | ClusterSetPlacementRule;

export function isLabelOperator(value: unknown): value is LabelOperator {
  return LABEL_OPERATORS.some((operator) => operator === value);
}
