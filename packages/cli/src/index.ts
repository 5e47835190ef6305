export { createProgram, run, EXIT_CODES, CLI_NAME, CLI_VERSION, type GlobalOptions } from './cli.js';
export { createGenerateCommand, executeGenerate, type GenerateOptions, type GenerateResult } from './commands/generate.js';
export { createValidateCommand, executeValidation, type ValidateOptions } from './commands/validate.js';
export { CliError, isCliError, toCliError } from './errors.js';
export { formatCliError, formatValidationResult, formatBundleEntries } from './formatter.js';
export type * from './types.js';
