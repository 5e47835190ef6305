import { mkdir, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  KUSTOMIZATION_FILE_NAME,
  POLICY_GENERATOR_FILE_NAME,
  buildKustomization,
  buildPolicyGenerator,
  serializeDocument,
  type PolicySpec,
} from '@policysmith/core';
import { usageError } from '../errors.js';
import type { GenerateOutput, ManifestFile } from '../types.js';

export const MANIFESTS_DIR_NAME = 'manifests';
export const PROCESSED_FILE_NAME = 'processed-resources.yaml';

export interface WriteOutputRequest {
  spec: PolicySpec;
  manifestFiles: readonly ManifestFile[];
  outputDir?: string;
  /** Serialized bundle; omitted when processing is turned off */
  bundleYaml?: string;
}

export function defaultOutputDir(policyName: string): string {
  return `acm-policy-${policyName}`;
}

/**
 * True when `dir` is the working directory or one of its ancestors
 */
function containsWorkingDirectory(dir: string): boolean {
  const fromDir = relative(dir, process.cwd());
  return fromDir === '' || (!isAbsolute(fromDir) && fromDir.split(sep)[0] !== '..');
}

/**
 * Recreate the output directory and write the manifests, the PolicyGenerator
 * inputs and, when given, the processed bundle.
 */
export async function writePolicyOutput(request: WriteOutputRequest): Promise<GenerateOutput> {
  const outputDir = resolve(request.outputDir || defaultOutputDir(request.spec.name));
  if (containsWorkingDirectory(outputDir)) {
    throw usageError(
      `Refusing to use ${outputDir} as the output directory: it contains the working directory`,
      'Pass a dedicated directory with --output',
    );
  }
  const manifestsDir = join(outputDir, MANIFESTS_DIR_NAME);

  await rm(outputDir, { recursive: true, force: true });
  await mkdir(manifestsDir, { recursive: true });

  const manifestFiles: string[] = [];
  for (const file of request.manifestFiles) {
    const target = join(manifestsDir, file.fileName);
    await writeFile(target, file.content, 'utf8');
    manifestFiles.push(target);
  }

  const policyGeneratorFile = join(outputDir, POLICY_GENERATOR_FILE_NAME);
  await writeFile(
    policyGeneratorFile,
    serializeDocument(buildPolicyGenerator(request.spec, MANIFESTS_DIR_NAME)),
    'utf8',
  );

  const kustomizationFile = join(outputDir, KUSTOMIZATION_FILE_NAME);
  await writeFile(kustomizationFile, serializeDocument(buildKustomization()), 'utf8');

  const output: GenerateOutput = {
    outputDir,
    manifestFiles,
    policyGeneratorFile,
    kustomizationFile,
  };

  if (request.bundleYaml !== undefined) {
    const processedFile = join(outputDir, PROCESSED_FILE_NAME);
    await writeFile(processedFile, request.bundleYaml, 'utf8');
    output.processedFile = processedFile;
  }

  return output;
}
