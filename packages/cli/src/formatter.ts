import type { BundleEntry } from '@policysmith/core';
import type { CliError } from './errors.js';
import type { DiagnosticIssue, OutputFormat, ValidationResult } from './types.js';

function issueDetailLines(issue: DiagnosticIssue): string[] {
  const lines: string[] = [];
  lines.push(`  - [${issue.code}] ${issue.message}`);
  if (issue.path) {
    lines.push(`    path: ${issue.path}`);
  }
  if (issue.resource) {
    lines.push(`    resource: ${issue.resource}`);
  }
  if (issue.field) {
    lines.push(`    field: ${issue.field}`);
  }
  if (issue.suggestion) {
    lines.push(`    suggestion: ${issue.suggestion}`);
  }

  return lines;
}

export function formatValidationResult(result: ValidationResult, format: OutputFormat, targetPath: string): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  if (format === 'github') {
    const lines: string[] = [];
    for (const error of result.errors) {
      const file = error.path ?? targetPath;
      lines.push(`::error file=${file}::[${error.code}] ${error.message}`);
      if (error.suggestion) {
        lines.push(`::notice file=${file}::suggestion: ${error.suggestion}`);
      }
    }

    for (const warning of result.warnings) {
      const file = warning.path ?? targetPath;
      lines.push(`::warning file=${file}::[${warning.code}] ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`::notice file=${file}::suggestion: ${warning.suggestion}`);
      }
    }

    if (lines.length === 0) {
      lines.push('::notice::validation passed');
    }

    return lines.join('\n');
  }

  const output: string[] = [];
  output.push(`Validating ${targetPath}...`);
  if (result.errors.length === 0 && result.warnings.length === 0) {
    output.push('✓ Validation passed');
  } else {
    if (result.errors.length > 0) {
      output.push('Errors:');
      for (const issue of result.errors) {
        output.push(...issueDetailLines(issue));
      }
    }

    if (result.warnings.length > 0) {
      output.push('Warnings:');
      for (const issue of result.warnings) {
        output.push(...issueDetailLines(issue));
      }
    }
  }

  output.push(
    `Summary: documents=${result.documentCount}, errors=${result.errors.length}, warnings=${result.warnings.length}`,
  );
  return output.join('\n');
}

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        exitCode: error.exitCode,
      },
      null,
      2,
    );
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}

function pad(value: string, width: number): string {
  if (value.length >= width) {
    return value;
  }
  return value + ' '.repeat(width - value.length);
}

/**
 * Table of the documents in a generated bundle
 */
export function formatBundleEntries(entries: readonly BundleEntry[]): string {
  const header = [pad('KIND', 26), pad('NAME', 32), 'NAMESPACE'].join(' ');
  const lines = [header];
  for (const entry of entries) {
    lines.push([pad(entry.kind, 26), pad(entry.name, 32), entry.namespace].join(' '));
  }
  return lines.join('\n');
}
