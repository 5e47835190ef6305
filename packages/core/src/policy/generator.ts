/**
 * PolicyGenerator and kustomization documents
 *
 * These are the kustomize-plugin inputs written next to the processed bundle,
 * for users who prefer to render the policy with kustomize themselves.
 */

import type { PolicySpec } from '../types/policy-spec.js';
import { POLICY_GENERATOR_API_VERSION } from './constants.js';
import { placementName } from './builder.js';

export const POLICY_GENERATOR_FILE_NAME = 'policygenerator.yaml';
export const KUSTOMIZATION_FILE_NAME = 'kustomization.yaml';

export interface PolicyGeneratorPolicy {
  name: string;
  manifests: Array<{ path: string }>;
  complianceType?: string;
}

export interface PolicyGeneratorPlacement {
  name: string;
  clusterSets?: string[];
  clusterSelectors?: Record<string, string>;
}

export interface PolicyGeneratorDocument {
  apiVersion: string;
  kind: 'PolicyGenerator';
  metadata: { name: string };
  policyDefaults: {
    namespace: string;
    remediationAction: string;
  };
  policies: PolicyGeneratorPolicy[];
  placement: PolicyGeneratorPlacement[];
}

export interface KustomizationDocument {
  resources: string[];
}

/**
 * Build the PolicyGenerator document for a policy whose manifests live
 * under `manifestsPath` (relative to the generator file).
 */
export function buildPolicyGenerator(
  spec: PolicySpec,
  manifestsPath = 'manifests'
): PolicyGeneratorDocument {
  const policy: PolicyGeneratorPolicy = {
    name: spec.name,
    manifests: [{ path: manifestsPath }],
  };
  if (spec.complianceType) {
    policy.complianceType = spec.complianceType;
  }

  const placement: PolicyGeneratorPlacement = { name: placementName(spec.name) };
  if (spec.targeting.type === 'clusterSets') {
    placement.clusterSets = [...spec.targeting.clusterSets];
  } else {
    placement.clusterSelectors = { ...spec.targeting.selectors };
  }

  return {
    apiVersion: POLICY_GENERATOR_API_VERSION,
    kind: 'PolicyGenerator',
    metadata: { name: spec.name },
    policyDefaults: {
      namespace: spec.namespace,
      remediationAction: spec.remediation,
    },
    policies: [policy],
    placement: [placement],
  };
}

export function buildKustomization(): KustomizationDocument {
  return { resources: [POLICY_GENERATOR_FILE_NAME] };
}
