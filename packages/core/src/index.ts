/**
 * policysmith core - policy bundle generation for cluster-management control planes
 *
 * @example
 * ```typescript
 * import { parsePolicySpec, generatePolicyBundle } from '@policysmith/core';
 *
 * const spec = parsePolicySpec({
 *   name: 'audit-logging',
 *   clusterSets: ['production'],
 *   placementLabels: [{ environment: ['prod'] }],
 *   manifests: [configMap],
 * });
 * const { yaml } = generatePolicyBundle(spec);
 * ```
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Errors
export {
  PolicyError,
  ConfigError,
  ManifestError,
  LabelPredicateError,
  isPolicyError,
  type ConfigIssue,
  type ConfigErrorOptions,
  type ManifestErrorOptions,
  type LabelPredicateErrorOptions,
} from './errors.js';

// Manifests
export * from './manifest/index.js';

// Placement
export * from './placement/index.js';

// Policy bundle
export * from './policy/index.js';

// Intent validation
export * from './spec/index.js';
