import { ConfigError, LabelPredicateError, ManifestError } from '@policysmith/core';
import type { ExitCode } from './types.js';

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isCliError(value: unknown): value is CliError {
  if (!isObjectRecord(value)) {
    return false;
  }

  const code = value['code'];
  const exitCode = value['exitCode'];
  const name = value['name'];

  return typeof code === 'string' && typeof exitCode === 'number' && name === 'CliError';
}

function manifestLocation(error: ManifestError): string {
  if (!error.source) {
    return '';
  }
  if (error.line !== undefined) {
    return ` (${error.source}:${error.line}${error.column !== undefined ? `:${error.column}` : ''})`;
  }
  return error.message.includes(error.source) ? '' : ` (${error.source})`;
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof ConfigError) {
    return new CliError({
      code: 'CONFIG_ERROR',
      message: error.message,
      exitCode: 3,
      suggestion: error.suggestion,
    });
  }

  if (error instanceof ManifestError) {
    return new CliError({
      code: 'MANIFEST_ERROR',
      message: `${error.message}${manifestLocation(error)}`,
      exitCode: 4,
      suggestion: error.suggestion,
    });
  }

  if (error instanceof LabelPredicateError) {
    return new CliError({
      code: 'LABEL_PREDICATE_ERROR',
      message: error.message,
      exitCode: 4,
      suggestion: error.suggestion ?? 'Use {key, operator, values} or {<key>: <value or list>}',
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: 'INTERNAL_ERROR',
      message: error.message,
      exitCode: 1,
      suggestion: 'Re-run with --verbose for details.',
    });
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: 1,
    suggestion: 'Check the command and its options, then try again.',
  });
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'INVALID_ARGUMENT',
    message,
    exitCode: 2,
    suggestion,
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'CONFIG_ERROR',
    message,
    exitCode: 3,
    suggestion,
  });
}

export function fileNotFoundError(filePath: string, suggestion?: string): CliError {
  return new CliError({
    code: 'FILE_NOT_FOUND',
    message: `File not found: ${filePath}`,
    exitCode: 3,
    suggestion,
  });
}
