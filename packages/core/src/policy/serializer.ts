/**
 * Bundle serialization
 *
 * Renders bundle documents as block-style YAML joined by `---` lines.
 */

import {
  parseAllDocuments,
  stringify,
  type CreateNodeOptions,
  type DocumentOptions,
  type SchemaOptions,
  type ToStringOptions,
} from 'yaml';
import { ManifestError } from '../errors.js';
import type { ResourceBundle } from '../types/resource.js';

export const DOCUMENT_SEPARATOR = '---';

/**
 * - keys keep insertion order
 * - null renders as an empty scalar
 * - no line folding
 * - YAML 1.1 scalars ("on", "yes", "no") get quoted for 1.1 readers
 * - a manifest object used twice is written out twice, not as an alias
 */
const STRINGIFY_OPTIONS = {
  version: '1.1',
  indent: 2,
  lineWidth: 0,
  minContentWidth: 0,
  nullStr: '',
  sortMapEntries: false,
  aliasDuplicateObjects: false,
} satisfies DocumentOptions & SchemaOptions & CreateNodeOptions & ToStringOptions;

/**
 * Render one document as YAML text ending with a newline
 */
export function serializeDocument(document: unknown): string {
  return stringify(document, STRINGIFY_OPTIONS);
}

/**
 * Render a whole bundle. A separator line sits between consecutive
 * documents, never before the first or after the last.
 */
export function serializeBundle(bundle: ResourceBundle): string {
  return bundle.entries
    .map((entry) => serializeDocument(entry.document))
    .join(`${DOCUMENT_SEPARATOR}\n`);
}

/**
 * Parse a serialized bundle back into plain documents, under the same
 * YAML 1.1 schema the bundle is written with
 *
 * @throws ManifestError on a YAML syntax error
 */
export function parseBundle(text: string, source?: string): unknown[] {
  if (!text.trim()) {
    return [];
  }

  return parseAllDocuments(text, { version: '1.1' }).map((doc, index) => {
    const firstError = doc.errors[0];
    if (firstError) {
      throw new ManifestError(`Invalid bundle document ${index}: ${firstError.message}`, {
        source,
        index,
        line: firstError.linePos?.[0]?.line,
        column: firstError.linePos?.[0]?.col,
        cause: firstError,
      });
    }
    const value: unknown = doc.toJS();
    return value;
  });
}
