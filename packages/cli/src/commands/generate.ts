/**
 * policysmith generate command
 *
 * Builds the policy bundle for a set of manifests and writes it out:
 * - manifests/ with copies of the input files
 * - policygenerator.yaml and kustomization.yaml
 * - processed-resources.yaml (Policy, ManagedClusterSetBindings, Placement, PlacementBinding)
 */

import { Command, Option } from "commander";
import ora from "ora";
import {
  COMPLIANCE_TYPES,
  PRUNE_OBJECT_BEHAVIORS,
  REMEDIATION_ACTIONS,
  generatePolicyBundle,
  parsePolicySpec,
  type GeneratedPolicyBundle,
  type PolicySpec,
} from "@policysmith/core";
import { formatBundleEntries } from "../formatter.js";
import { loadManifestFiles } from "../services/manifests.js";
import { writePolicyOutput } from "../services/output.js";
import type { GenerateOutput } from "../types.js";
import {
  loadPolicyConfig,
  resolveGenerateInputs,
  type GenerateFlags,
  type LoadedPolicyConfig,
} from "../utils/config.js";
import { getChalk, getLoggerOptions, logger } from "../utils/logger.js";

/**
 * Generate command options
 */
export interface GenerateOptions extends GenerateFlags {
  config?: string;
  stdout?: boolean;
}

/**
 * Result of a generate run
 */
export interface GenerateResult {
  spec: PolicySpec;
  generated: GeneratedPolicyBundle;
  /** Undefined when the bundle went to stdout */
  output?: GenerateOutput;
}

function readStringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

function toGenerateOptions(options: Record<string, unknown>): GenerateOptions {
  return {
    config: readStringOption(options, "config"),
    name: readStringOption(options, "name"),
    files: readStringOption(options, "files"),
    selectors: readStringOption(options, "selectors"),
    clustersets: readStringOption(options, "clustersets"),
    namespace: readStringOption(options, "namespace"),
    remediation: readStringOption(options, "remediation"),
    output: readStringOption(options, "output"),
    complianceType: readStringOption(options, "complianceType"),
    pruneObjectBehavior: readStringOption(options, "pruneObjectBehavior"),
    process: options.process !== false,
    stdout: options.stdout === true,
  };
}

function hasPlacementLabels(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null && value !== "";
}

/**
 * Run generation with already-parsed options
 */
export async function executeGenerate(options: GenerateOptions): Promise<GenerateResult> {
  let config: LoadedPolicyConfig | undefined;
  if (options.config) {
    logger.info(`Loading configuration from ${options.config}`);
    config = await loadPolicyConfig(options.config);
    if (config.unknownKeys.length > 0) {
      logger.warn(`Ignoring unknown config keys: ${config.unknownKeys.join(", ")}`);
    }
  }

  const inputs = resolveGenerateInputs(options, config);
  const manifests = await loadManifestFiles(inputs.files);
  for (const file of manifests.files) {
    logger.debug(`Loaded ${file.path}`);
  }

  const spec = parsePolicySpec({ ...inputs.intent, manifests: manifests.documents });
  if (spec.targeting.type === "selectors" && hasPlacementLabels(inputs.intent.placementLabels)) {
    logger.warn("placementLabels only apply to cluster set targeting and are ignored with cluster selectors");
  }

  const generated = generatePolicyBundle(spec);

  if (options.stdout) {
    logger.write(generated.yaml);
    return { spec, generated };
  }

  const loggerOptions = getLoggerOptions();
  const spinner = ora({
    text: "Writing policy files...",
    isSilent: loggerOptions.quiet === true || loggerOptions.json === true,
  }).start();

  let output: GenerateOutput;
  try {
    output = await writePolicyOutput({
      spec,
      manifestFiles: manifests.files,
      outputDir: inputs.outputDir,
      bundleYaml: inputs.process ? generated.yaml : undefined,
    });
  } catch (err) {
    spinner.fail("Failed to write policy files");
    throw err;
  }
  spinner.stop();

  return { spec, generated, output };
}

function printSummary(result: GenerateResult): void {
  const { spec, generated, output } = result;
  if (!output) {
    return;
  }

  if (getLoggerOptions().json) {
    logger.json({
      policyName: spec.name,
      namespace: spec.namespace,
      remediation: spec.remediation,
      outputDir: output.outputDir,
      processedFile: output.processedFile ?? null,
      documents: generated.bundle.entries.map((entry) => ({
        kind: entry.kind,
        name: entry.name,
        namespace: entry.namespace,
      })),
    });
    return;
  }

  const c = getChalk();
  logger.success(`Generated policy ${c.bold(spec.name)} in ${output.outputDir}`);
  logger.info(`  Namespace: ${spec.namespace}`);
  logger.info(`  Remediation: ${spec.remediation}`);
  if (spec.complianceType) {
    logger.info(`  Compliance type: ${spec.complianceType}`);
  }
  if (spec.pruneObjectBehavior) {
    logger.info(`  Prune object behavior: ${spec.pruneObjectBehavior}`);
  }
  if (spec.targeting.type === "clusterSets") {
    logger.info(`  Cluster sets: ${spec.targeting.clusterSets.join(", ")}`);
  } else {
    const pairs = Object.entries(spec.targeting.selectors).map(([key, value]) => `${key}=${value}`);
    logger.info(`  Cluster selectors: ${pairs.join(", ")}`);
  }

  if (output.processedFile) {
    logger.info("");
    logger.info(formatBundleEntries(generated.bundle.entries));
    logger.info("");
    logger.info("Next step: apply the processed resources");
    logger.info(`  oc apply -f ${output.processedFile}`);
  } else {
    logger.info("");
    logger.info("Next step: apply the PolicyGenerator");
    logger.info(`  oc apply -f ${output.policyGeneratorFile}`);
  }
}

/**
 * Create the generate command
 */
export function createGenerateCommand(): Command {
  const command = new Command("generate")
    .description("Generate a policy bundle from Kubernetes manifests")
    .addHelpText(
      "after",
      `
Examples:
  $ policysmith generate -n audit-logging -f configmap.yaml -s environment=prod
  $ policysmith generate -n audit-logging -f a.yaml,b.yaml --clustersets prod-east,prod-west
  $ policysmith generate -c policy-config.yaml
  $ policysmith generate -c policy-config.yaml --stdout

Relative manifest paths under "files" in a config file resolve against the
config file's directory; paths given with --files resolve against the current
directory.`
    )
    .addOption(new Option("-c, --config <file>", "Load settings from a YAML file (overrides flags)"))
    .addOption(new Option("-n, --name <name>", "Policy name"))
    .addOption(new Option("-f, --files <files>", "Comma-separated manifest files"))
    .addOption(new Option("-s, --selectors <selectors>", "Comma-separated cluster selectors (key=value)"))
    .addOption(new Option("--clustersets <sets>", "Comma-separated cluster set names"))
    .addOption(new Option("-N, --namespace <namespace>", "Namespace for the policy resources"))
    .addOption(
      new Option("-r, --remediation <action>", "Remediation action").choices([...REMEDIATION_ACTIONS])
    )
    .addOption(new Option("-o, --output <dir>", "Output directory (default: acm-policy-<name>)"))
    .addOption(
      new Option("--compliance-type <type>", "Compliance type").choices([...COMPLIANCE_TYPES])
    )
    .addOption(
      new Option("--prune-object-behavior <behavior>", "Prune object behavior").choices([
        ...PRUNE_OBJECT_BEHAVIORS,
      ])
    )
    .addOption(new Option("--no-process", "Only write the PolicyGenerator inputs"))
    .addOption(new Option("--stdout", "Print the processed bundle instead of writing files").default(false))
    .action(async (options: Record<string, unknown>) => {
      const result = await executeGenerate(toGenerateOptions(options));
      printSummary(result);
    });

  return command;
}

export default createGenerateCommand;
