/**
 * Policy configuration file
 *
 * Loads the YAML file passed with --config and merges it with command-line
 * flags into a raw policy intent.
 */
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import YAML from "yaml";
import { isRecord, isStringArray, type RawPolicyIntent } from "@policysmith/core";
import { configError } from "../errors.js";
import { parseList, parseSelectorList } from "./args.js";

/**
 * Keys accepted in a policy configuration file
 */
export const POLICY_CONFIG_KEYS = [
  "policyName",
  "namespace",
  "remediationAction",
  "complianceType",
  "pruneObjectBehavior",
  "files",
  "clusterSelectors",
  "clusterSets",
  "placementLabels",
  "outputDir",
  "processPolicyGenerator",
] as const;

export type PolicyConfigKey = (typeof POLICY_CONFIG_KEYS)[number];

/**
 * Policy configuration file, values not yet validated
 */
export type PolicyConfigFile = Partial<Record<PolicyConfigKey, unknown>>;

/**
 * A loaded configuration file and the directory its relative paths resolve against
 */
export interface LoadedPolicyConfig {
  path: string;
  baseDir: string;
  values: PolicyConfigFile;
  /** Keys present in the file that are not recognised */
  unknownKeys: string[];
}

/**
 * `generate` command-line flags
 */
export interface GenerateFlags {
  name?: string;
  files?: string;
  selectors?: string;
  clustersets?: string;
  namespace?: string;
  remediation?: string;
  output?: string;
  complianceType?: string;
  pruneObjectBehavior?: string;
  process?: boolean;
}

/**
 * Everything `generate` needs before manifests are read
 */
export interface GenerateInputs {
  /** Raw intent without manifests */
  intent: Omit<RawPolicyIntent, "manifests">;
  /** Absolute manifest file paths, in order */
  files: string[];
  outputDir?: string;
  process: boolean;
}

function isPolicyConfigKey(key: string): key is PolicyConfigKey {
  return POLICY_CONFIG_KEYS.some((known) => known === key);
}

/**
 * Parse config file content
 */
export function parsePolicyConfig(content: string, source: string): Omit<LoadedPolicyConfig, "path" | "baseDir"> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configError(`Failed to parse config file ${source}: ${reason}`);
  }

  if (parsed === null || parsed === undefined) {
    return { values: {}, unknownKeys: [] };
  }

  if (!isRecord(parsed)) {
    throw configError(`Config file ${source} must contain a mapping`);
  }

  const values: PolicyConfigFile = {};
  const unknownKeys: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (isPolicyConfigKey(key)) {
      values[key] = value;
    } else {
      unknownKeys.push(key);
    }
  }
  return { values, unknownKeys };
}

/**
 * Load a policy configuration file
 */
export async function loadPolicyConfig(filePath: string): Promise<LoadedPolicyConfig> {
  const absolutePath = resolve(filePath);
  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (err) {
    if (
      err !== null &&
      typeof err === "object" &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      throw configError(`Config file not found: ${filePath}`, "Check the path passed to --config");
    }
    throw err;
  }

  return {
    path: absolutePath,
    baseDir: dirname(absolutePath),
    ...parsePolicyConfig(content, filePath),
  };
}

function configFiles(value: unknown, baseDir: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const entries = typeof value === "string" ? parseList(value) : value;
  if (!isStringArray(entries)) {
    throw configError('"files" must be a list of file paths');
  }
  return entries.map((entry) => resolve(baseDir, entry));
}

function configProcess(value: unknown): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "false") {
    return value === "true";
  }
  throw configError('"processPolicyGenerator" must be true or false');
}

function configOutputDir(value: unknown): string | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw configError('"outputDir" must be a directory path');
  }
  return value;
}

/**
 * Pick the config file value when the key is present, the flag value otherwise
 */
function pick(values: PolicyConfigFile, key: PolicyConfigKey, flag: unknown): unknown {
  return values[key] !== undefined ? values[key] : flag;
}

/**
 * Merge flags and an optional config file. Values present in the file win
 * over flags; relative `files` entries resolve against the file's directory.
 */
export function resolveGenerateInputs(
  flags: GenerateFlags,
  config?: LoadedPolicyConfig
): GenerateInputs {
  const values = config?.values ?? {};

  const flagSelectors = parseSelectorList(flags.selectors);
  const flagClusterSets = parseList(flags.clustersets);

  const intent: Omit<RawPolicyIntent, "manifests"> = {
    name: pick(values, "policyName", flags.name),
    namespace: pick(values, "namespace", flags.namespace),
    remediation: pick(values, "remediationAction", flags.remediation),
    complianceType: pick(values, "complianceType", flags.complianceType),
    pruneObjectBehavior: pick(values, "pruneObjectBehavior", flags.pruneObjectBehavior),
    clusterSelectors: pick(
      values,
      "clusterSelectors",
      Object.keys(flagSelectors).length > 0 ? flagSelectors : undefined
    ),
    clusterSets: pick(values, "clusterSets", flagClusterSets.length > 0 ? flagClusterSets : undefined),
    placementLabels: values.placementLabels,
  };

  const files =
    (config ? configFiles(values.files, config.baseDir) : undefined) ??
    parseList(flags.files).map((file) => resolve(file));

  return {
    intent,
    files,
    outputDir: configOutputDir(values.outputDir) ?? (flags.output || undefined),
    process: configProcess(values.processPolicyGenerator) ?? flags.process ?? true,
  };
}
