/**
 * Policy bundle builder tests
 */

import { describe, it, expect } from 'vitest';
import { buildPolicyBundle, bindingName, placementName } from '../../src/policy/builder.js';
import { resolvePlacementRule } from '../../src/placement/resolver.js';
import { ConfigError, ManifestError } from '../../src/errors.js';
import type {
  ManagedClusterSetBinding,
  PlacementBindingResource,
  PlacementResource,
  PolicyResource,
  PolicySpec,
  ResourceBundle,
} from '../../src/types/index.js';
import { clusterSetSpec, configMap, namespaceManifest, selectorSpec } from '../fixtures.js';

function build(spec: PolicySpec): ResourceBundle {
  return buildPolicyBundle(spec, resolvePlacementRule(spec.targeting, spec.placementLabels));
}

function policyOf(bundle: ResourceBundle): PolicyResource {
  const document = bundle.entries[0]?.document;
  if (!document || document.kind !== 'Policy') {
    throw new Error('first document is not a Policy');
  }
  return document;
}

function placementOf(bundle: ResourceBundle): PlacementResource {
  const document = bundle.entries.find((entry) => entry.kind === 'Placement')?.document;
  if (!document || document.kind !== 'Placement') {
    throw new Error('no Placement in bundle');
  }
  return document;
}

function bindingOf(bundle: ResourceBundle): PlacementBindingResource {
  const document = bundle.entries[bundle.entries.length - 1]?.document;
  if (!document || document.kind !== 'PlacementBinding') {
    throw new Error('last document is not a PlacementBinding');
  }
  return document;
}

describe('naming', () => {
  it('derives placement and binding names from the policy name', () => {
    expect(placementName('audit')).toBe('placement-audit');
    expect(bindingName('audit')).toBe('binding-audit');
  });
});

describe('buildPolicyBundle', () => {
  describe('selector targeting', () => {
    const bundle = build(selectorSpec());

    it('emits Policy, Placement, PlacementBinding in order', () => {
      expect(bundle.entries.map((entry) => [entry.kind, entry.name, entry.namespace])).toEqual([
        ['Policy', 'audit-logging', 'policies'],
        ['Placement', 'placement-audit-logging', 'policies'],
        ['PlacementBinding', 'binding-audit-logging', 'policies'],
      ]);
    });

    it('builds a label selector placement with an explicit empty cluster set list', () => {
      expect(placementOf(bundle)).toEqual({
        apiVersion: 'cluster.open-cluster-management.io/v1beta1',
        kind: 'Placement',
        metadata: { name: 'placement-audit-logging', namespace: 'policies' },
        spec: {
          clusterSets: [],
          numberOfClusters: null,
          predicates: [
            {
              requiredClusterSelector: {
                labelSelector: { matchLabels: { environment: 'prod', region: 'us-east' } },
              },
            },
          ],
        },
      });
    });

    it('keeps placement spec keys in construction order', () => {
      expect(Object.keys(placementOf(bundle).spec)).toEqual([
        'clusterSets',
        'numberOfClusters',
        'predicates',
      ]);
    });
  });

  describe('cluster set targeting', () => {
    it('emits one ManagedClusterSetBinding per cluster set between Policy and Placement', () => {
      const bundle = build(clusterSetSpec());
      expect(bundle.entries.map((entry) => entry.kind)).toEqual([
        'Policy',
        'ManagedClusterSetBinding',
        'ManagedClusterSetBinding',
        'ManagedClusterSetBinding',
        'Placement',
        'PlacementBinding',
      ]);

      const bindings = bundle.entries
        .filter((entry) => entry.kind === 'ManagedClusterSetBinding')
        .map((entry) => entry.document);
      expect(bindings[0]).toEqual({
        apiVersion: 'cluster.open-cluster-management.io/v1beta2',
        kind: 'ManagedClusterSetBinding',
        metadata: { name: 'a', namespace: 'policies' },
        spec: { clusterSet: 'a' },
      } satisfies ManagedClusterSetBinding);
      expect(bindings.map((document) => document.metadata.name)).toEqual(['a', 'b', 'c']);
    });

    it('omits predicates when there are no placement labels', () => {
      const placement = placementOf(build(clusterSetSpec()));
      expect(placement.spec).toEqual({ clusterSets: ['a', 'b', 'c'] });
      expect('predicates' in placement.spec).toBe(false);
      expect('numberOfClusters' in placement.spec).toBe(false);
    });

    it('adds match expressions when placement labels are given', () => {
      const placement = placementOf(
        build(clusterSetSpec({ placementLabels: [{ environment: ['dev', 'test'] }] }))
      );
      expect(placement.spec.predicates).toEqual([
        {
          requiredClusterSelector: {
            labelSelector: {
              matchExpressions: [{ key: 'environment', operator: 'In', values: ['dev', 'test'] }],
            },
          },
        },
      ]);
    });
  });

  describe('Policy', () => {
    it('wraps a ConfigurationPolicy with one object template per manifest', () => {
      const policy = policyOf(build(selectorSpec()));
      expect(policy.apiVersion).toBe('policy.open-cluster-management.io/v1');
      expect(policy.metadata).toEqual({ name: 'audit-logging', namespace: 'policies' });
      expect(Object.keys(policy.spec)).toEqual([
        'remediationAction',
        'disabled',
        'policy-templates',
        'placement',
      ]);
      expect(policy.spec.remediationAction).toBe('enforce');
      expect(policy.spec.disabled).toBe(false);

      const templates = policy.spec['policy-templates'];
      expect(templates).toHaveLength(1);
      const configurationPolicy = templates[0]?.objectDefinition;
      expect(configurationPolicy?.kind).toBe('ConfigurationPolicy');
      expect(configurationPolicy?.apiVersion).toBe('policy.open-cluster-management.io/v1');
      expect(configurationPolicy?.metadata).toEqual({ name: 'audit-logging' });
      expect(configurationPolicy?.spec.remediationAction).toBe('enforce');
      expect(configurationPolicy?.spec.severity).toBe('low');

      const objectTemplates = configurationPolicy?.spec['object-templates'] ?? [];
      expect(objectTemplates).toHaveLength(2);
      expect(objectTemplates[0]?.objectDefinition).toBe(configMap);
      expect(objectTemplates[1]?.objectDefinition).toBe(namespaceManifest);
    });

    it('references placement and binding by name for both targeting variants', () => {
      const expected = [
        { placement: 'placement-audit-logging', placementBinding: 'binding-audit-logging' },
      ];
      expect(policyOf(build(selectorSpec())).spec.placement).toEqual(expected);
      expect(policyOf(build(clusterSetSpec())).spec.placement).toEqual(expected);
    });

    it('omits pruneObjectBehavior when unset', () => {
      const policy = policyOf(build(selectorSpec()));
      const template = policy.spec['policy-templates'][0]?.objectDefinition.spec['object-templates'][0];
      expect(template).toBeDefined();
      expect(Object.keys(template ?? {})).toEqual(['complianceType', 'objectDefinition']);
    });

    it('appends pruneObjectBehavior when set', () => {
      const policy = policyOf(build(selectorSpec({ pruneObjectBehavior: 'DeleteIfCreated' })));
      const templates = policy.spec['policy-templates'][0]?.objectDefinition.spec['object-templates'];
      expect(templates?.[1]).toEqual({
        complianceType: 'musthave',
        objectDefinition: namespaceManifest,
        pruneObjectBehavior: 'DeleteIfCreated',
      });
    });

    // Known discrepancy: the policy-level complianceType is accepted but object
    // templates always say "musthave".
    it('keeps object template complianceType at musthave even when mustnothave is configured', () => {
      const policy = policyOf(build(selectorSpec({ complianceType: 'mustnothave' })));
      const templates = policy.spec['policy-templates'][0]?.objectDefinition.spec['object-templates'] ?? [];
      expect(templates.map((template) => template.complianceType)).toEqual(['musthave', 'musthave']);
    });
  });

  describe('PlacementBinding', () => {
    it('binds the Placement to the Policy', () => {
      expect(bindingOf(build(clusterSetSpec()))).toEqual({
        apiVersion: 'policy.open-cluster-management.io/v1',
        kind: 'PlacementBinding',
        metadata: { name: 'binding-audit-logging', namespace: 'policies' },
        placementRef: {
          name: 'placement-audit-logging',
          kind: 'Placement',
          apiGroup: 'cluster.open-cluster-management.io',
        },
        subjects: [
          {
            name: 'audit-logging',
            kind: 'Policy',
            apiGroup: 'policy.open-cluster-management.io',
          },
        ],
      });
    });
  });

  describe('errors', () => {
    it('rejects an empty manifest list', () => {
      expect(() => build(selectorSpec({ manifests: [] }))).toThrow(ManifestError);
    });

    it('rejects an empty policy name', () => {
      expect(() => build(selectorSpec({ name: ' ' }))).toThrow(ConfigError);
    });
  });

  it('does not mutate its inputs', () => {
    const spec = clusterSetSpec({ placementLabels: [{ environment: 'dev' }] });
    const snapshot = structuredClone(spec);
    build(spec);
    expect(spec).toEqual(snapshot);
  });
});
