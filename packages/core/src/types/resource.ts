/**
 * Generated resource types
 */

import type { ManifestDocument } from './policy-spec.js';

/**
 * Resource metadata
 */
export interface ResourceMetadata {
  name: string;
  namespace?: string;
}

/**
 * Common resource shape
 */
export interface Resource<K extends string = string, T = unknown> {
  apiVersion: string;
  kind: K;
  metadata: ResourceMetadata;
  spec: T;
}

/**
 * Kinds emitted into a policy bundle
 */
export type BundleKind = 'Policy' | 'ManagedClusterSetBinding' | 'Placement' | 'PlacementBinding';

export interface ObjectTemplate {
  complianceType: 'musthave';
  objectDefinition: ManifestDocument;
  pruneObjectBehavior?: string;
}

export interface ConfigurationPolicySpec {
  remediationAction: string;
  severity: 'low';
  'object-templates': ObjectTemplate[];
}

export type ConfigurationPolicy = Resource<'ConfigurationPolicy', ConfigurationPolicySpec>;

export interface PolicyPlacementRef {
  placement: string;
  placementBinding: string;
}

export interface PolicyResourceSpec {
  remediationAction: string;
  disabled: boolean;
  'policy-templates': Array<{ objectDefinition: ConfigurationPolicy }>;
  placement: PolicyPlacementRef[];
}

export type PolicyResource = Resource<'Policy', PolicyResourceSpec>;

export type ManagedClusterSetBinding = Resource<'ManagedClusterSetBinding', { clusterSet: string }>;

export interface LabelSelector {
  matchLabels?: Record<string, string>;
  matchExpressions?: Array<{ key: string; operator: string; values: string[] }>;
}

export interface PlacementPredicate {
  requiredClusterSelector: {
    labelSelector: LabelSelector;
  };
}

export interface PlacementSpec {
  clusterSets: string[];
  numberOfClusters?: number | null;
  predicates?: PlacementPredicate[];
}

export type PlacementResource = Resource<'Placement', PlacementSpec>;

/**
 * PlacementBinding carries its references at the top level, not under spec
 */
export interface PlacementBindingResource {
  apiVersion: string;
  kind: 'PlacementBinding';
  metadata: ResourceMetadata;
  placementRef: {
    name: string;
    kind: 'Placement';
    apiGroup: string;
  };
  subjects: Array<{
    name: string;
    kind: 'Policy';
    apiGroup: string;
  }>;
}

/**
 * Any document a bundle can hold
 */
export type BundleDocument =
  | PolicyResource
  | ManagedClusterSetBinding
  | PlacementResource
  | PlacementBindingResource;

/**
 * One bundle document tagged with its identity
 */
export interface BundleEntry {
  kind: BundleKind;
  name: string;
  namespace: string;
  document: BundleDocument;
}

/**
 * Ordered bundle: Policy, ManagedClusterSetBindings, Placement, PlacementBinding
 */
export interface ResourceBundle {
  entries: readonly BundleEntry[];
}
