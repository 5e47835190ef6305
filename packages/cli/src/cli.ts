/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, CommanderError, Option } from "commander";
import { toCliError } from "./errors.js";
import { formatCliError } from "./formatter.js";
import type { ExitCode } from "./types.js";
import { configureLogger, getLoggerOptions } from "./utils/logger.js";
import { createGenerateCommand } from "./commands/generate.js";
import { createValidateCommand } from "./commands/validate.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

export const CLI_NAME = "policysmith";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  VALIDATION_ERROR: 4,
} as const satisfies Record<string, ExitCode>;

/**
 * Apply global options before a command runs
 */
function setupGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();

  configureLogger({
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor: opts.color === false,
    json: opts.json === true,
  });

  return opts;
}

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Generate cluster-management policy bundles from Kubernetes manifests")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ policysmith generate -n my-policy -f cm.yaml -s environment=prod
  $ policysmith generate -c policy-config.yaml
  $ policysmith validate acm-policy-my-policy/processed-resources.yaml`
    );

  program
    .addOption(
      new Option("-v, --verbose", "Enable verbose output").default(false)
    )
    .addOption(
      new Option("-q, --quiet", "Minimize output (only errors)").default(false)
    )
    .addOption(
      new Option("--no-color", "Disable color output")
    )
    .addOption(
      new Option("--json", "Output in JSON format").default(false)
    );

  program.hook("preAction", (_thisCommand, actionCommand) => {
    setupGlobalOptions(actionCommand);
  });

  program.addCommand(createGenerateCommand());
  program.addCommand(createValidateCommand());

  return program;
}

function isJsonRequested(program: Command): boolean {
  return program.opts<GlobalOptions>().json === true || getLoggerOptions().json === true;
}

/**
 * Run the CLI program and set process.exitCode
 *
 * @param args full argv, including the node binary and script path
 */
export async function run(args: string[] = process.argv): Promise<number> {
  const program = createProgram();
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  try {
    await program.parseAsync(args);
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version exit with 0; commander already printed the message
      const exitCode = err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
      process.exitCode = exitCode;
      return exitCode;
    }

    const cliError = toCliError(err);
    process.stderr.write(formatCliError(cliError, isJsonRequested(program)) + "\n");
    process.exitCode = cliError.exitCode;
    return cliError.exitCode;
  }

  return typeof process.exitCode === "number" ? process.exitCode : EXIT_CODES.SUCCESS;
}
