/**
 * End-to-end bundle generation: resolve placement, build, serialize
 */

import { resolvePlacementRule } from '../placement/resolver.js';
import type { PlacementRule } from '../types/placement.js';
import type { PolicySpec } from '../types/policy-spec.js';
import type { ResourceBundle } from '../types/resource.js';
import { buildPolicyBundle } from './builder.js';
import { serializeBundle } from './serializer.js';

export interface GeneratedPolicyBundle {
  rule: PlacementRule;
  bundle: ResourceBundle;
  /** Multi-document YAML of the bundle */
  yaml: string;
}

/**
 * Run the whole pipeline for one policy. Fails fast on the first error.
 */
export function generatePolicyBundle(spec: PolicySpec): GeneratedPolicyBundle {
  const rule = resolvePlacementRule(spec.targeting, spec.placementLabels);
  const bundle = buildPolicyBundle(spec, rule);
  return { rule, bundle, yaml: serializeBundle(bundle) };
}
