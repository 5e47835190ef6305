/**
 * Policy bundle builder
 *
 * Assembles Policy, ManagedClusterSetBinding, Placement and PlacementBinding
 * documents with consistent names and cross-references. Pure: no I/O and no
 * mutation of the inputs.
 */

import { ConfigError } from '../errors.js';
import { createManifestSet, type ManifestSet } from '../manifest/manifest-set.js';
import type { PlacementRule } from '../types/placement.js';
import type { PolicySpec, PruneObjectBehavior } from '../types/policy-spec.js';
import type {
  BundleEntry,
  ConfigurationPolicy,
  ManagedClusterSetBinding,
  ObjectTemplate,
  PlacementBindingResource,
  PlacementResource,
  PlacementSpec,
  PolicyResource,
  ResourceBundle,
} from '../types/resource.js';
import {
  CLUSTER_API_GROUP,
  CONFIGURATION_POLICY_API_VERSION,
  CONFIGURATION_POLICY_SEVERITY,
  MANAGED_CLUSTER_SET_BINDING_API_VERSION,
  OBJECT_TEMPLATE_COMPLIANCE_TYPE,
  PLACEMENT_API_VERSION,
  PLACEMENT_BINDING_API_VERSION,
  POLICY_API_GROUP,
  POLICY_API_VERSION,
} from './constants.js';

export function placementName(policyName: string): string {
  return `placement-${policyName}`;
}

export function bindingName(policyName: string): string {
  return `binding-${policyName}`;
}

function buildObjectTemplates(
  manifests: ManifestSet,
  pruneObjectBehavior?: PruneObjectBehavior
): ObjectTemplate[] {
  return manifests.map((manifest) => {
    // complianceType is fixed per object; PolicySpec.complianceType is not applied here
    const template: ObjectTemplate = {
      complianceType: OBJECT_TEMPLATE_COMPLIANCE_TYPE,
      objectDefinition: manifest,
    };
    if (pruneObjectBehavior) {
      template.pruneObjectBehavior = pruneObjectBehavior;
    }
    return template;
  });
}

function buildPolicy(spec: PolicySpec, manifests: ManifestSet): PolicyResource {
  const configurationPolicy: ConfigurationPolicy = {
    apiVersion: CONFIGURATION_POLICY_API_VERSION,
    kind: 'ConfigurationPolicy',
    metadata: {
      name: spec.name,
    },
    spec: {
      remediationAction: spec.remediation,
      severity: CONFIGURATION_POLICY_SEVERITY,
      'object-templates': buildObjectTemplates(manifests, spec.pruneObjectBehavior),
    },
  };

  return {
    apiVersion: POLICY_API_VERSION,
    kind: 'Policy',
    metadata: {
      name: spec.name,
      namespace: spec.namespace,
    },
    spec: {
      remediationAction: spec.remediation,
      disabled: false,
      'policy-templates': [{ objectDefinition: configurationPolicy }],
      placement: [
        {
          placement: placementName(spec.name),
          placementBinding: bindingName(spec.name),
        },
      ],
    },
  };
}

function buildClusterSetBinding(clusterSet: string, namespace: string): ManagedClusterSetBinding {
  return {
    apiVersion: MANAGED_CLUSTER_SET_BINDING_API_VERSION,
    kind: 'ManagedClusterSetBinding',
    metadata: {
      name: clusterSet,
      namespace,
    },
    spec: {
      clusterSet,
    },
  };
}

function buildPlacementSpec(rule: PlacementRule): PlacementSpec {
  if (rule.type === 'selector') {
    return {
      clusterSets: [],
      numberOfClusters: null,
      predicates: [
        {
          requiredClusterSelector: {
            labelSelector: { matchLabels: { ...rule.matchLabels } },
          },
        },
      ],
    };
  }

  const spec: PlacementSpec = {
    clusterSets: [...rule.clusterSets],
  };
  if (rule.matchExpressions.length > 0) {
    spec.predicates = [
      {
        requiredClusterSelector: {
          labelSelector: {
            matchExpressions: rule.matchExpressions.map((expression) => ({
              key: expression.key,
              operator: expression.operator,
              values: [...expression.values],
            })),
          },
        },
      },
    ];
  }
  return spec;
}

function buildPlacement(spec: PolicySpec, rule: PlacementRule): PlacementResource {
  return {
    apiVersion: PLACEMENT_API_VERSION,
    kind: 'Placement',
    metadata: {
      name: placementName(spec.name),
      namespace: spec.namespace,
    },
    spec: buildPlacementSpec(rule),
  };
}

function buildPlacementBinding(spec: PolicySpec): PlacementBindingResource {
  return {
    apiVersion: PLACEMENT_BINDING_API_VERSION,
    kind: 'PlacementBinding',
    metadata: {
      name: bindingName(spec.name),
      namespace: spec.namespace,
    },
    placementRef: {
      name: placementName(spec.name),
      kind: 'Placement',
      apiGroup: CLUSTER_API_GROUP,
    },
    subjects: [
      {
        name: spec.name,
        kind: 'Policy',
        apiGroup: POLICY_API_GROUP,
      },
    ],
  };
}

/**
 * Build the ordered resource bundle for a policy.
 *
 * Order: Policy, one ManagedClusterSetBinding per cluster set (cluster set
 * rules only), Placement, PlacementBinding.
 *
 * @throws ConfigError when the policy name is empty
 * @throws ManifestError when there are no manifests or one is not a mapping
 */
export function buildPolicyBundle(spec: PolicySpec, rule: PlacementRule): ResourceBundle {
  if (typeof spec.name !== 'string' || spec.name.trim() === '') {
    throw new ConfigError('Policy name is required', { field: 'name' });
  }

  const manifests = createManifestSet(spec.manifests);
  const entries: BundleEntry[] = [];

  const policy = buildPolicy(spec, manifests);
  entries.push({ kind: 'Policy', name: spec.name, namespace: spec.namespace, document: policy });

  if (rule.type === 'clusterSet') {
    for (const clusterSet of rule.clusterSets) {
      entries.push({
        kind: 'ManagedClusterSetBinding',
        name: clusterSet,
        namespace: spec.namespace,
        document: buildClusterSetBinding(clusterSet, spec.namespace),
      });
    }
  }

  const placement = buildPlacement(spec, rule);
  entries.push({
    kind: 'Placement',
    name: placement.metadata.name,
    namespace: spec.namespace,
    document: placement,
  });

  const binding = buildPlacementBinding(spec);
  entries.push({
    kind: 'PlacementBinding',
    name: binding.metadata.name,
    namespace: spec.namespace,
    document: binding,
  });

  return { entries };
}
