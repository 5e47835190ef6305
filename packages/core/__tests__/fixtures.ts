import type { ManifestDocument, PolicySpec } from '../src/types/index.js';

export const configMap: ManifestDocument = {
  apiVersion: 'v1',
  kind: 'ConfigMap',
  metadata: { name: 'audit-settings', namespace: 'kube-system' },
  data: { level: 'verbose' },
};

export const namespaceManifest: ManifestDocument = {
  apiVersion: 'v1',
  kind: 'Namespace',
  metadata: { name: 'team-a' },
};

export function selectorSpec(overrides: Partial<PolicySpec> = {}): PolicySpec {
  return {
    name: 'audit-logging',
    namespace: 'policies',
    remediation: 'enforce',
    targeting: { type: 'selectors', selectors: { environment: 'prod', region: 'us-east' } },
    placementLabels: [],
    manifests: [configMap, namespaceManifest],
    ...overrides,
  };
}

export function clusterSetSpec(overrides: Partial<PolicySpec> = {}): PolicySpec {
  return {
    name: 'audit-logging',
    namespace: 'policies',
    remediation: 'inform',
    targeting: { type: 'clusterSets', clusterSets: ['a', 'b', 'c'] },
    placementLabels: [],
    manifests: [configMap],
    ...overrides,
  };
}
