/**
 * Policy intent types
 *
 * A PolicySpec is the validated, canonical input of the bundle pipeline.
 */

import type { LabelPredicateInput } from './placement.js';

/**
 * Valid remediation actions
 */
export const REMEDIATION_ACTIONS = ['enforce', 'inform'] as const;

/**
 * Whether violations are only reported (inform) or corrected (enforce)
 */
export type RemediationAction = (typeof REMEDIATION_ACTIONS)[number];

/**
 * Valid compliance types
 */
export const COMPLIANCE_TYPES = ['musthave', 'mustnothave'] as const;

export type ComplianceType = (typeof COMPLIANCE_TYPES)[number];

/**
 * Valid prune object behaviors
 */
export const PRUNE_OBJECT_BEHAVIORS = ['none', 'DeleteAll', 'DeleteIfCreated'] as const;

/**
 * What happens to created objects when the policy is removed or updated
 */
export type PruneObjectBehavior = (typeof PRUNE_OBJECT_BEHAVIORS)[number];

/**
 * A parsed manifest document (always a mapping)
 */
export type ManifestDocument = Record<string, unknown>;

/**
 * Label selector targeting
 */
export interface SelectorTargeting {
  type: 'selectors';
  /** Cluster label selectors (non-empty) */
  selectors: Record<string, string>;
}

/**
 * Named cluster set targeting
 */
export interface ClusterSetTargeting {
  type: 'clusterSets';
  /** Cluster set names in input order (non-empty) */
  clusterSets: string[];
}

/**
 * Which clusters a policy applies to. Exactly one variant.
 */
export type Targeting = SelectorTargeting | ClusterSetTargeting;

/**
 * Validated policy intent
 */
export interface PolicySpec {
  /** Policy name (non-empty) */
  name: string;
  /** Namespace of every namespaced resource in the bundle */
  namespace: string;
  remediation: RemediationAction;
  complianceType?: ComplianceType;
  pruneObjectBehavior?: PruneObjectBehavior;
  targeting: Targeting;
  /** Only meaningful with cluster set targeting */
  placementLabels: LabelPredicateInput[];
  /** Manifest documents in input order (non-empty) */
  manifests: ManifestDocument[];
}

export function isRemediationAction(value: unknown): value is RemediationAction {
  return REMEDIATION_ACTIONS.some((action) => action === value);
}

export function isComplianceType(value: unknown): value is ComplianceType {
  return COMPLIANCE_TYPES.some((type) => type === value);
}

export function isPruneObjectBehavior(value: unknown): value is PruneObjectBehavior {
  return PRUNE_OBJECT_BEHAVIORS.some((behavior) => behavior === value);
}
