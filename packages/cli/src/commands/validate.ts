/**
 * policysmith validate command
 *
 * Re-reads a processed bundle and checks:
 * - YAML syntax
 * - document order (Policy, ManagedClusterSetBindings, Placement, PlacementBinding)
 * - apiVersion of each kind
 * - cross-references between Policy, Placement and PlacementBinding
 */

import { Command, Option } from "commander";
import * as fs from "node:fs";
import * as path from "node:path";
import ora from "ora";
import {
  ManifestError,
  isRecord,
  parseBundle,
  verifyBundleDocuments,
  type BundleIssue,
} from "@policysmith/core";
import { fileNotFoundError } from "../errors.js";
import { formatValidationResult } from "../formatter.js";
import { isOutputFormat, type DiagnosticIssue, type OutputFormat, type ValidationResult } from "../types.js";
import { getLoggerOptions, logger } from "../utils/logger.js";

/**
 * Validate command options
 */
export interface ValidateOptions {
  strict: boolean;
  format: OutputFormat;
}

function toDiagnostic(issue: BundleIssue, filePath: string): DiagnosticIssue {
  const diagnostic: DiagnosticIssue = {
    code: issue.code,
    message: issue.message,
    path: filePath,
  };
  if (issue.index !== undefined) {
    diagnostic.field = `document[${issue.index}]`;
  }
  return diagnostic;
}

/**
 * Warnings about documents that are valid but probably not what was intended
 */
function collectWarnings(documents: readonly unknown[], filePath: string): DiagnosticIssue[] {
  const warnings: DiagnosticIssue[] = [];
  documents.forEach((document, index) => {
    if (!isRecord(document) || document.kind !== "Policy") {
      return;
    }
    const spec = document.spec;
    if (isRecord(spec) && spec.disabled === true) {
      const metadata = document.metadata;
      const name = isRecord(metadata) && typeof metadata.name === "string" ? metadata.name : "";
      warnings.push({
        code: "POLICY_DISABLED",
        message: "Policy is disabled and will not be propagated",
        path: filePath,
        resource: `Policy/${name}`,
        field: `document[${index}].spec.disabled`,
      });
    }
  });
  return warnings;
}

/**
 * Validate a processed bundle file
 */
export async function executeValidation(
  filePath: string,
  options: ValidateOptions
): Promise<ValidationResult> {
  const absolutePath = path.resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch (err) {
    if (err !== null && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      throw fileNotFoundError(absolutePath, "Pass the processed-resources.yaml written by generate");
    }
    throw err;
  }

  let documents: unknown[];
  try {
    documents = parseBundle(content, absolutePath);
  } catch (err) {
    if (err instanceof ManifestError) {
      return {
        valid: false,
        errors: [
          {
            code: "PARSE_ERROR",
            message: err.message,
            path: err.line !== undefined ? `${absolutePath}:${err.line}` : absolutePath,
          },
        ],
        warnings: [],
        documentCount: 0,
      };
    }
    throw err;
  }

  const errors = verifyBundleDocuments(documents).map((issue) => toDiagnostic(issue, absolutePath));
  const warnings = collectWarnings(documents, absolutePath);

  let valid = errors.length === 0;
  if (options.strict && warnings.length > 0) {
    valid = false;
  }

  return {
    valid,
    errors,
    warnings,
    documentCount: documents.length,
  };
}

/**
 * Create the validate command
 */
export function createValidateCommand(): Command {
  const command = new Command("validate")
    .description("Validate a processed policy bundle")
    .addHelpText(
      "after",
      `
Examples:
  $ policysmith validate acm-policy-audit/processed-resources.yaml
  $ policysmith validate bundle.yaml --strict          Treat warnings as errors
  $ policysmith validate bundle.yaml --format json     Output as JSON
  $ policysmith validate bundle.yaml --format github   GitHub Actions annotations`
    )
    .argument("<file>", "Processed bundle file")
    .addOption(new Option("--strict", "Treat warnings as errors").default(false))
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(["text", "json", "github"])
        .default("text")
    )
    .action(async (filePath: string, options: Record<string, unknown>) => {
      const format = getLoggerOptions().json
        ? "json"
        : isOutputFormat(options.format)
          ? options.format
          : "text";
      const validateOptions: ValidateOptions = {
        strict: options.strict === true,
        format,
      };

      const spinner = ora({
        text: "Validating bundle...",
        isSilent: format !== "text" || getLoggerOptions().quiet === true,
      }).start();
      let result: ValidationResult;
      try {
        result = await executeValidation(filePath, validateOptions);
      } finally {
        spinner.stop();
      }

      logger.write(formatValidationResult(result, format, filePath) + "\n");

      if (!result.valid) {
        process.exitCode = 4;
      }
    });

  return command;
}

export default createValidateCommand;
