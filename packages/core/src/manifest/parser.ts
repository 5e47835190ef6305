/**
 * Manifest file parsing
 */

import { parseAllDocuments, YAMLError } from 'yaml';
import { ManifestError } from '../errors.js';
import type { ManifestDocument } from '../types/policy-spec.js';
import { isRecord } from '../types/json.js';

/**
 * Parse every YAML document of a manifest file (--- separated).
 * Empty documents are skipped.
 *
 * @param content file content
 * @param source file path, used in error messages
 * @throws ManifestError on a syntax error or a document that is not a mapping
 */
export function parseManifestDocuments(content: string, source?: string): ManifestDocument[] {
  if (!content.trim()) {
    return [];
  }

  const where = source ? ` in ${source}` : '';
  const documents = parseAllDocuments(content);
  const manifests: ManifestDocument[] = [];

  for (let i = 0; i < documents.length; i++) {
    const doc = documents[i];
    if (!doc) continue;

    const firstError = doc.errors[0];
    if (firstError) {
      throw new ManifestError(`Invalid YAML${where} (document ${i}): ${firstError.message}`, {
        source,
        index: i,
        line: getLineFromError(firstError),
        column: getColumnFromError(firstError),
        cause: firstError,
      });
    }

    const parsed: unknown = doc.toJS();
    if (parsed === null || parsed === undefined) {
      continue;
    }

    if (!isRecord(parsed)) {
      throw new ManifestError(`Document ${i}${where} is not a mapping`, {
        source,
        index: i,
      });
    }

    manifests.push(parsed);
  }

  return manifests;
}

function getLineFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.line;
}

function getColumnFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.col;
}
