/**
 * Manifest set
 *
 * Ordered, non-empty collection of parsed manifest mappings. Order is input order.
 */

import { ManifestError } from '../errors.js';
import { isRecord } from '../types/json.js';
import type { ManifestDocument } from '../types/policy-spec.js';

export type ManifestSet = readonly ManifestDocument[];

/**
 * Check every document and freeze the list.
 * The documents themselves are kept by reference so they can be embedded verbatim.
 *
 * @throws ManifestError when the set is empty or a document is not a mapping
 */
export function createManifestSet(documents: readonly unknown[]): ManifestSet {
  if (documents.length === 0) {
    throw new ManifestError('At least one manifest is required', {
      suggestion: 'Pass manifest files with --files or list them under "files" in the config',
    });
  }

  const manifests: ManifestDocument[] = [];
  documents.forEach((document, index) => {
    if (!isRecord(document)) {
      const actual = Array.isArray(document) ? 'a list' : document === null ? 'null' : typeof document;
      throw new ManifestError(`Manifest at index ${index} must be a mapping, got ${actual}`, {
        index,
      });
    }
    manifests.push(document);
  });

  return Object.freeze(manifests);
}
