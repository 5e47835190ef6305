export * from './constants.js';
export { buildPolicyBundle, placementName, bindingName } from './builder.js';
export {
  serializeBundle,
  serializeDocument,
  parseBundle,
  DOCUMENT_SEPARATOR,
} from './serializer.js';
export {
  buildPolicyGenerator,
  buildKustomization,
  POLICY_GENERATOR_FILE_NAME,
  KUSTOMIZATION_FILE_NAME,
  type PolicyGeneratorDocument,
  type PolicyGeneratorPolicy,
  type PolicyGeneratorPlacement,
  type KustomizationDocument,
} from './generator.js';
export { generatePolicyBundle, type GeneratedPolicyBundle } from './pipeline.js';
export {
  verifyBundleDocuments,
  type BundleIssue,
  type BundleIssueCode,
} from './verify.js';
