/**
 * Placement rule resolution
 *
 * Turns the targeting part of a PolicySpec into one canonical PlacementRule.
 */

import { ConfigError } from '../errors.js';
import { isRecord, isStringArray } from '../types/json.js';
import type { PlacementRule } from '../types/placement.js';
import type { Targeting } from '../types/policy-spec.js';
import { normalizeLabelPredicates } from './label-predicates.js';

function hasEntries(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return false;
}

function toMatchLabels(selectors: unknown): Record<string, string> {
  if (!isRecord(selectors)) {
    throw new ConfigError('Cluster selectors must be a mapping of label to value', {
      field: 'targeting.selectors',
    });
  }

  const matchLabels: Record<string, string> = {};
  for (const [key, value] of Object.entries(selectors)) {
    if (typeof value !== 'string') {
      throw new ConfigError(`Cluster selector "${key}" must have a string value`, {
        field: `targeting.selectors.${key}`,
      });
    }
    matchLabels[key] = value;
  }
  return matchLabels;
}

/**
 * Check that exactly one targeting variant is populated.
 * Values typed as Targeting can still carry both fields when they were
 * assembled from untyped input, so the union is checked again here.
 */
function assertSingleVariant(targeting: Targeting): void {
  const record: Record<string, unknown> = { ...targeting };
  const hasSelectors = hasEntries(record.selectors);
  const hasClusterSets = hasEntries(record.clusterSets);

  if (hasSelectors && hasClusterSets) {
    throw new ConfigError('Cannot use both cluster selectors and cluster sets. Choose one.', {
      field: 'targeting',
    });
  }
  if (!hasSelectors && !hasClusterSets) {
    throw new ConfigError('Either cluster selectors or cluster sets are required', {
      field: 'targeting',
      suggestion: 'Set clusterSelectors (key: value) or clusterSets (list of names)',
    });
  }
  if (targeting.type === 'selectors' ? !hasSelectors : !hasClusterSets) {
    throw new ConfigError(`Targeting type "${targeting.type}" has no entries`, {
      field: 'targeting',
    });
  }
}

/**
 * Resolve targeting and placement labels into a PlacementRule.
 *
 * Selector targeting ignores `labels`. Cluster set targeting normalizes every
 * label predicate into a match expression; no labels means no expressions.
 *
 * @throws ConfigError when both or neither targeting variant is set
 * @throws LabelPredicateError when a label predicate is malformed
 */
export function resolvePlacementRule(
  targeting: Targeting,
  labels: readonly unknown[] = []
): PlacementRule {
  assertSingleVariant(targeting);

  if (targeting.type === 'selectors') {
    return {
      type: 'selector',
      matchLabels: toMatchLabels(targeting.selectors),
    };
  }

  if (!isStringArray(targeting.clusterSets)) {
    throw new ConfigError('Cluster sets must be a list of names', {
      field: 'targeting.clusterSets',
    });
  }

  return {
    type: 'clusterSet',
    clusterSets: [...targeting.clusterSets],
    matchExpressions: normalizeLabelPredicates(labels),
  };
}
