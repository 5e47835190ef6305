/**
 * Label predicate normalization
 *
 * Accepts the two predicate shapes users write and turns both into
 * `{ key, operator, values }` match expressions:
 *
 * ```yaml
 * placementLabels:
 *   - key: environment
 *     operator: In
 *     values: ["dev"]
 *   - environment: ["dev", "test"]
 *   - region: us-east
 * ```
 */

import { LabelPredicateError } from '../errors.js';
import { isRecord, isStringArray } from '../types/json.js';
import {
  LABEL_OPERATORS,
  isLabelOperator,
  type LabelPredicateInput,
  type NormalizedExpression,
} from '../types/placement.js';

const DEFAULT_OPERATOR = 'In';

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

function normalizeFullForm(
  entry: Record<string, unknown>,
  index: number
): NormalizedExpression {
  const key = entry.key;
  if (typeof key !== 'string' || key.length === 0) {
    throw new LabelPredicateError(
      `placementLabels[${index}]: "key" must be a non-empty string, got ${typeName(key)}`,
      { index }
    );
  }

  const operator = entry.operator ?? DEFAULT_OPERATOR;
  if (!isLabelOperator(operator)) {
    throw new LabelPredicateError(
      `placementLabels[${index}]: unsupported operator "${String(operator)}" for key "${key}"`,
      {
        index,
        key,
        suggestion: `Use one of: ${LABEL_OPERATORS.join(', ')}`,
      }
    );
  }

  const rawValues = entry.values;
  let values: string[];
  if (rawValues === undefined) {
    values = [];
  } else if (typeof rawValues === 'string') {
    values = [rawValues];
  } else if (isStringArray(rawValues)) {
    values = [...rawValues];
  } else {
    throw new LabelPredicateError(
      `placementLabels[${index}]: "values" of key "${key}" must be a string or a list of strings, got ${typeName(rawValues)}`,
      { index, key }
    );
  }

  return { key, operator, values };
}

function expandShorthand(
  entry: Record<string, unknown>,
  index: number
): NormalizedExpression[] {
  const expressions: NormalizedExpression[] = [];

  for (const [key, value] of Object.entries(entry)) {
    if (typeof value === 'string') {
      expressions.push({ key, operator: DEFAULT_OPERATOR, values: [value] });
    } else if (isStringArray(value)) {
      expressions.push({ key, operator: DEFAULT_OPERATOR, values: [...value] });
    } else {
      throw new LabelPredicateError(
        `placementLabels[${index}]: value of "${key}" must be a string or a list of strings, got ${typeName(value)}`,
        { index, key }
      );
    }
  }

  return expressions;
}

/**
 * Normalize one predicate entry. A full-form entry yields one expression,
 * a shorthand entry yields one expression per key, in key order.
 *
 * @throws LabelPredicateError when the entry matches neither form
 */
export function normalizeLabelPredicate(
  input: unknown,
  index = 0
): NormalizedExpression[] {
  if (!isRecord(input)) {
    throw new LabelPredicateError(
      `placementLabels[${index}]: expected a mapping, got ${typeName(input)}`,
      { index }
    );
  }

  if (Object.keys(input).length === 0) {
    throw new LabelPredicateError(`placementLabels[${index}]: empty label predicate`, {
      index,
      suggestion: 'Write either { key, operator, values } or { <label>: <value(s)> }',
    });
  }

  if ('key' in input) {
    return [normalizeFullForm(input, index)];
  }

  return expandShorthand(input, index);
}

/**
 * Normalize a predicate list, preserving outer order and expansion order
 */
export function normalizeLabelPredicates(
  inputs: readonly unknown[]
): NormalizedExpression[] {
  return inputs.flatMap((input, index) => normalizeLabelPredicate(input, index));
}

/**
 * Structural guard for label predicate input: a full-form or shorthand entry
 * that normalizes without error
 */
export function isLabelPredicateInput(value: unknown): value is LabelPredicateInput {
  try {
    normalizeLabelPredicate(value);
    return true;
  } catch (error) {
    if (error instanceof LabelPredicateError) {
      return false;
    }
    throw error;
  }
}
