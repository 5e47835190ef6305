/**
 * Bundle verification
 *
 * Checks a parsed bundle (e.g. a processed-resources.yaml read back from disk)
 * against the order and cross-reference rules the builder guarantees.
 */

import { isRecord } from '../types/json.js';
import type { BundleKind } from '../types/resource.js';
import {
  MANAGED_CLUSTER_SET_BINDING_API_VERSION,
  PLACEMENT_API_VERSION,
  PLACEMENT_BINDING_API_VERSION,
  POLICY_API_VERSION,
} from './constants.js';

export type BundleIssueCode =
  | 'EMPTY_BUNDLE'
  | 'INVALID_DOCUMENT'
  | 'UNEXPECTED_KIND'
  | 'API_VERSION_MISMATCH'
  | 'MISSING_RESOURCE'
  | 'REFERENCE_MISMATCH';

export interface BundleIssue {
  code: BundleIssueCode;
  message: string;
  /** Document index in the stream */
  index?: number;
}

const EXPECTED_API_VERSIONS: Record<BundleKind, string> = {
  Policy: POLICY_API_VERSION,
  ManagedClusterSetBinding: MANAGED_CLUSTER_SET_BINDING_API_VERSION,
  Placement: PLACEMENT_API_VERSION,
  PlacementBinding: PLACEMENT_BINDING_API_VERSION,
};

function isBundleKind(value: unknown): value is BundleKind {
  return typeof value === 'string' && value in EXPECTED_API_VERSIONS;
}

function getPath(value: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

interface IndexedDocument {
  index: number;
  kind: BundleKind;
  document: Record<string, unknown>;
}

/**
 * Position of each kind in the bundle order
 */
const KIND_RANK: Record<BundleKind, number> = {
  Policy: 0,
  ManagedClusterSetBinding: 1,
  Placement: 2,
  PlacementBinding: 3,
};

/**
 * Verify a parsed bundle. Returns every issue found; an empty list means
 * the bundle is consistent.
 */
export function verifyBundleDocuments(documents: readonly unknown[]): BundleIssue[] {
  const issues: BundleIssue[] = [];
  if (documents.length === 0) {
    return [{ code: 'EMPTY_BUNDLE', message: 'Bundle contains no documents' }];
  }

  const indexed: IndexedDocument[] = [];
  documents.forEach((document, index) => {
    if (!isRecord(document)) {
      issues.push({ code: 'INVALID_DOCUMENT', message: `Document ${index} is not a mapping`, index });
      return;
    }
    const kind = document.kind;
    if (!isBundleKind(kind)) {
      issues.push({
        code: 'UNEXPECTED_KIND',
        message: `Document ${index} has unexpected kind "${String(kind)}"`,
        index,
      });
      return;
    }
    if (document.apiVersion !== EXPECTED_API_VERSIONS[kind]) {
      issues.push({
        code: 'API_VERSION_MISMATCH',
        message: `${kind} at document ${index} has apiVersion "${String(document.apiVersion)}", expected "${EXPECTED_API_VERSIONS[kind]}"`,
        index,
      });
    }
    indexed.push({ index, kind, document });
  });

  let previousRank = -1;
  for (const entry of indexed) {
    const rank = KIND_RANK[entry.kind];
    if (rank < previousRank) {
      issues.push({
        code: 'UNEXPECTED_KIND',
        message: `${entry.kind} at document ${entry.index} is out of order`,
        index: entry.index,
      });
    }
    previousRank = Math.max(previousRank, rank);
  }

  const ofKind = (kind: BundleKind): IndexedDocument[] =>
    indexed.filter((entry) => entry.kind === kind);

  for (const kind of ['Policy', 'Placement', 'PlacementBinding'] as const) {
    const count = ofKind(kind).length;
    if (count !== 1) {
      issues.push({
        code: 'MISSING_RESOURCE',
        message: `Expected exactly one ${kind}, found ${count}`,
      });
    }
  }

  const policy = ofKind('Policy')[0];
  const placement = ofKind('Placement')[0];
  const binding = ofKind('PlacementBinding')[0];
  if (!policy || !placement || !binding) {
    return issues;
  }

  const policyName = getPath(policy.document, ['metadata', 'name']);
  const placementName = getPath(placement.document, ['metadata', 'name']);
  const bindingName = getPath(binding.document, ['metadata', 'name']);

  const referencedPlacement = getPath(policy.document, ['spec', 'placement', 0, 'placement']);
  const referencedBinding = getPath(policy.document, ['spec', 'placement', 0, 'placementBinding']);
  if (referencedPlacement !== placementName) {
    issues.push({
      code: 'REFERENCE_MISMATCH',
      message: `Policy references placement "${String(referencedPlacement)}" but the Placement is named "${String(placementName)}"`,
      index: policy.index,
    });
  }
  if (referencedBinding !== bindingName) {
    issues.push({
      code: 'REFERENCE_MISMATCH',
      message: `Policy references placement binding "${String(referencedBinding)}" but the PlacementBinding is named "${String(bindingName)}"`,
      index: policy.index,
    });
  }

  const placementRef = getPath(binding.document, ['placementRef', 'name']);
  if (placementRef !== placementName) {
    issues.push({
      code: 'REFERENCE_MISMATCH',
      message: `PlacementBinding points at placement "${String(placementRef)}" but the Placement is named "${String(placementName)}"`,
      index: binding.index,
    });
  }

  const subject = getPath(binding.document, ['subjects', 0, 'name']);
  if (subject !== policyName) {
    issues.push({
      code: 'REFERENCE_MISMATCH',
      message: `PlacementBinding subject "${String(subject)}" does not match Policy "${String(policyName)}"`,
      index: binding.index,
    });
  }

  const clusterSets = getPath(placement.document, ['spec', 'clusterSets']);
  const placementSets = Array.isArray(clusterSets) ? clusterSets : [];
  for (const setBinding of ofKind('ManagedClusterSetBinding')) {
    const clusterSet = getPath(setBinding.document, ['spec', 'clusterSet']);
    if (!placementSets.includes(clusterSet)) {
      issues.push({
        code: 'REFERENCE_MISMATCH',
        message: `ManagedClusterSetBinding for "${String(clusterSet)}" is not used by the Placement`,
        index: setBinding.index,
      });
    }
  }
  for (const clusterSet of placementSets) {
    const bound = ofKind('ManagedClusterSetBinding').some(
      (entry) => getPath(entry.document, ['spec', 'clusterSet']) === clusterSet
    );
    if (!bound) {
      issues.push({
        code: 'MISSING_RESOURCE',
        message: `Cluster set "${String(clusterSet)}" has no ManagedClusterSetBinding`,
        index: placement.index,
      });
    }
  }

  return issues;
}
