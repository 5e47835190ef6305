/**
 * Policy generation error types
 *
 * Every failure of the pipeline is raised synchronously as one of these and
 * aborts the whole run; no partial bundle is ever returned.
 */

/**
 * Base class of all policy generation errors
 */
export class PolicyError extends Error {
  readonly errorCause?: unknown;
  /** Next step to suggest to the user */
  readonly suggestion?: string;

  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super(message);
    this.name = 'PolicyError';
    if (options?.cause) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A single invalid field of the policy intent
 */
export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * ConfigError options
 */
export interface ConfigErrorOptions {
  cause?: unknown;
  /** Offending field (e.g. "targeting", "remediation") */
  field?: string;
  /** All issues found when several fields were checked together */
  issues?: ConfigIssue[];
  suggestion?: string;
}

/**
 * Invalid targeting union or enum value
 */
export class ConfigError extends PolicyError {
  readonly field?: string;
  readonly issues: ConfigIssue[];

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'ConfigError';
    this.field = options.field;
    this.issues =
      options.issues ?? (options.field ? [{ field: options.field, message }] : []);

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * ManifestError options
 */
export interface ManifestErrorOptions {
  cause?: unknown;
  /** Source file path */
  source?: string;
  /** Manifest index within the manifest set, or document index within a file */
  index?: number;
  line?: number;
  column?: number;
  suggestion?: string;
}

/**
 * Empty manifest set, unparsable manifest, or manifest that is not a mapping
 */
export class ManifestError extends PolicyError {
  readonly source?: string;
  readonly index?: number;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, options: ManifestErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'ManifestError';
    this.source = options.source;
    this.index = options.index;
    this.line = options.line;
    this.column = options.column;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * LabelPredicateError options
 */
export interface LabelPredicateErrorOptions {
  cause?: unknown;
  /** Index of the entry in placementLabels */
  index?: number;
  /** Label key, when known */
  key?: string;
  suggestion?: string;
}

/**
 * Label predicate entry that is neither full nor shorthand form
 */
export class LabelPredicateError extends PolicyError {
  readonly index?: number;
  readonly key?: string;

  constructor(message: string, options: LabelPredicateErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'LabelPredicateError';
    this.index = options.index;
    this.key = options.key;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isPolicyError(value: unknown): value is PolicyError {
  return value instanceof PolicyError;
}
