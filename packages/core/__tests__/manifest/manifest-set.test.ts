/**
 * Manifest set tests
 */

import { describe, it, expect } from 'vitest';
import { createManifestSet } from '../../src/manifest/manifest-set.js';
import { ManifestError } from '../../src/errors.js';
import { configMap, namespaceManifest } from '../fixtures.js';

describe('createManifestSet', () => {
  it('keeps input order and document identity', () => {
    const set = createManifestSet([namespaceManifest, configMap]);
    expect(set).toHaveLength(2);
    expect(set[0]).toBe(namespaceManifest);
    expect(set[1]).toBe(configMap);
    expect(Object.isFrozen(set)).toBe(true);
  });

  it('rejects an empty set', () => {
    expect(() => createManifestSet([])).toThrow('At least one manifest is required');
  });

  it('names the index of a document that is not a mapping', () => {
    try {
      createManifestSet([configMap, ['not', 'a', 'mapping']]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestError);
      if (error instanceof ManifestError) {
        expect(error.index).toBe(1);
        expect(error.message).toBe('Manifest at index 1 must be a mapping, got a list');
      }
    }
  });

  it('rejects scalar and null documents', () => {
    expect(() => createManifestSet(['kind: ConfigMap'])).toThrow(
      'Manifest at index 0 must be a mapping, got string'
    );
    expect(() => createManifestSet([null])).toThrow(
      'Manifest at index 0 must be a mapping, got null'
    );
  });
});
