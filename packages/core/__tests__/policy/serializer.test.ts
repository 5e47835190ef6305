/**
 * Bundle serializer tests
 */

import { describe, it, expect } from 'vitest';
import {
  parseBundle,
  serializeBundle,
  serializeDocument,
} from '../../src/policy/serializer.js';
import { buildPolicyBundle } from '../../src/policy/builder.js';
import { resolvePlacementRule } from '../../src/placement/resolver.js';
import { ManifestError } from '../../src/errors.js';
import type { PolicySpec, ResourceBundle } from '../../src/types/index.js';
import { clusterSetSpec, configMap, selectorSpec } from '../fixtures.js';

function build(spec: PolicySpec): ResourceBundle {
  return buildPolicyBundle(spec, resolvePlacementRule(spec.targeting, spec.placementLabels));
}

describe('serializeDocument', () => {
  it('renders block style YAML in insertion order', () => {
    const yaml = serializeDocument({
      apiVersion: 'cluster.open-cluster-management.io/v1beta2',
      kind: 'ManagedClusterSetBinding',
      metadata: { name: 'prod', namespace: 'policies' },
      spec: { clusterSet: 'prod' },
    });
    expect(yaml).toBe(
      [
        'apiVersion: cluster.open-cluster-management.io/v1beta2',
        'kind: ManagedClusterSetBinding',
        'metadata:',
        '  name: prod',
        '  namespace: policies',
        'spec:',
        '  clusterSet: prod',
        '',
      ].join('\n')
    );
  });

  it('does not sort keys', () => {
    const yaml = serializeDocument({ zeta: 1, alpha: 2 });
    expect(yaml).toBe('zeta: 1\nalpha: 2\n');
  });

  it('passes unicode through unescaped', () => {
    expect(serializeDocument({ greeting: 'café ☕' })).toContain('café ☕');
  });

  it('does not fold long values', () => {
    const description = Array.from({ length: 60 }, () => 'segment').join(' ');
    const yaml = serializeDocument({ description });
    expect(yaml.split('\n')).toContain(`description: ${description}`);
  });
});

describe('serializeBundle', () => {
  it('places a separator between documents only', () => {
    const yaml = serializeBundle(build(selectorSpec()));
    const lines = yaml.split('\n');
    expect(lines.filter((line) => line === '---')).toHaveLength(2);
    expect(lines[0]).toBe('apiVersion: policy.open-cluster-management.io/v1');
    expect(yaml.endsWith('---\n')).toBe(false);
  });

  it('writes 3 separators for a 4 document bundle', () => {
    const bundle = build(clusterSetSpec({ targeting: { type: 'clusterSets', clusterSets: ['prod'] } }));
    expect(bundle.entries).toHaveLength(4);

    const yaml = serializeBundle(bundle);
    const lines = yaml.split('\n');
    expect(lines.filter((line) => line === '---')).toHaveLength(3);
    expect(lines[0]).not.toBe('---');
    expect(lines[lines.length - 2]).not.toBe('---');
  });

  it('renders null as an empty scalar', () => {
    const yaml = serializeBundle(build(selectorSpec()));
    expect(yaml).toMatch(/^ {2}numberOfClusters: ?$/m);
    expect(yaml).not.toContain('null');
  });

  it('writes a reused manifest twice instead of aliasing it', () => {
    const yaml = serializeBundle(build(selectorSpec({ manifests: [configMap, configMap] })));
    expect(yaml).not.toContain('&a1');
    expect(yaml).not.toContain('*a1');
    expect(yaml.match(/name: audit-settings/g)).toHaveLength(2);
  });

  it('returns an empty string for an empty bundle', () => {
    expect(serializeBundle({ entries: [] })).toBe('');
  });

  it('round-trips to the same documents', () => {
    const spec = clusterSetSpec({
      placementLabels: [{ environment: ['dev', 'test'] }],
      pruneObjectBehavior: 'DeleteAll',
      manifests: [
        configMap,
        {
          apiVersion: 'v1',
          kind: 'ConfigMap',
          metadata: { name: 'flags' },
          data: { enabled: 'on', replicas: '3', empty: '', mode: '0o17', mask: '0x1F', limit: '1e3' },
        },
      ],
    });
    const bundle = build(spec);
    const parsed = parseBundle(serializeBundle(bundle));
    expect(parsed).toEqual(bundle.entries.map((entry) => entry.document));
  });

  it('keeps strings that only YAML 1.2 reads as numbers', () => {
    const parsed = parseBundle(serializeDocument({ data: { mode: '0o17' } }));
    expect(parsed).toEqual([{ data: { mode: '0o17' } }]);
  });

  it('round-trips the null placement field as null', () => {
    const parsed = parseBundle(serializeBundle(build(selectorSpec())));
    expect(parsed[1]).toMatchObject({ kind: 'Placement', spec: { numberOfClusters: null } });
  });
});

describe('parseBundle', () => {
  it('returns no documents for blank input', () => {
    expect(parseBundle('  \n')).toEqual([]);
  });

  it('raises ManifestError on invalid YAML', () => {
    expect(() => parseBundle('kind: Policy\n---\nkey: [unclosed\n', 'bundle.yaml')).toThrow(
      ManifestError
    );
  });
});
