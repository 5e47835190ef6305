export type ExitCode = 0 | 1 | 2 | 3 | 4;

export type OutputFormat = 'text' | 'json' | 'github';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'github'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

export interface DiagnosticIssue {
  code: string;
  message: string;
  path?: string;
  resource?: string;
  field?: string;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: DiagnosticIssue[];
  warnings: DiagnosticIssue[];
  documentCount: number;
}

/**
 * One manifest file read from disk
 */
export interface ManifestFile {
  /** Absolute path of the source file */
  path: string;
  /** File name, used inside the output manifests/ directory */
  fileName: string;
  /** Raw content, copied verbatim into the output directory */
  content: string;
}

/**
 * Files written by `policysmith generate`
 */
export interface GenerateOutput {
  outputDir: string;
  manifestFiles: string[];
  policyGeneratorFile: string;
  kustomizationFile: string;
  processedFile?: string;
}
