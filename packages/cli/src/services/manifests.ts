import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ManifestError, parseManifestDocuments, type ManifestDocument } from '@policysmith/core';
import { fileNotFoundError, usageError } from '../errors.js';
import type { ManifestFile } from '../types.js';

export interface LoadedManifests {
  files: ManifestFile[];
  /** Every document of every file, in file order */
  documents: ManifestDocument[];
}

function isNotFound(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  );
}

async function readManifestFile(filePath: string): Promise<ManifestFile> {
  try {
    const content = await readFile(filePath, 'utf8');
    return { path: filePath, fileName: basename(filePath), content };
  } catch (error) {
    if (isNotFound(error)) {
      throw fileNotFoundError(filePath, 'Check the paths passed with --files or listed under "files"');
    }
    throw error;
  }
}

/**
 * Read and parse manifest files. Each file may hold several `---` separated
 * documents; a file without any document is an error.
 */
export async function loadManifestFiles(paths: readonly string[]): Promise<LoadedManifests> {
  const seen = new Map<string, string>();
  for (const filePath of paths) {
    const fileName = basename(filePath);
    const previous = seen.get(fileName);
    if (previous !== undefined) {
      throw usageError(
        `Manifest files ${previous} and ${filePath} share the file name ${fileName}`,
        'Rename one of them; manifests are copied into a single directory',
      );
    }
    seen.set(fileName, filePath);
  }

  const files: ManifestFile[] = [];
  const documents: ManifestDocument[] = [];
  for (const filePath of paths) {
    const file = await readManifestFile(filePath);
    const parsed = parseManifestDocuments(file.content, filePath);
    if (parsed.length === 0) {
      throw new ManifestError(`Manifest file ${filePath} contains no documents`, { source: filePath });
    }
    files.push(file);
    documents.push(...parsed);
  }

  return { files, documents };
}
