/**
 * CLI output
 *
 * stdout carries command results: the bundle YAML, summaries and JSON
 * documents. Warnings go to stderr so `generate --stdout` stays pipeable.
 */
import { Chalk, type ChalkInstance } from "chalk";

/**
 * Output switches set from the global --verbose, --quiet, --no-color and --json flags
 */
export interface OutputSettings {
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  json: boolean;
}

let settings: OutputSettings = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

const plainChalk = new Chalk({ level: 0 });
const colorChalk = new Chalk();

export function getChalk(): ChalkInstance {
  return settings.noColor ? plainChalk : colorChalk;
}

export function configureLogger(update: Partial<OutputSettings>): void {
  settings = { ...settings, ...update };
}

export function getLoggerOptions(): Readonly<OutputSettings> {
  return { ...settings };
}

// --json output is a single document on stdout; progress lines would corrupt it
function showsProgress(): boolean {
  return !settings.quiet && !settings.json;
}

function writeLine(stream: NodeJS.WritableStream, text: string): void {
  stream.write(`${text}\n`);
}

export const logger = {
  /** Per-file detail, only with --verbose */
  debug(message: string): void {
    if (settings.verbose && showsProgress()) {
      writeLine(process.stdout, getChalk().gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    if (showsProgress()) {
      writeLine(process.stdout, message);
    }
  },

  success(message: string): void {
    if (showsProgress()) {
      writeLine(process.stdout, `${getChalk().green("✓")} ${message}`);
    }
  },

  /** A JSON line on stderr under --json, silenced by --quiet */
  warn(message: string): void {
    if (settings.quiet) {
      return;
    }
    if (settings.json) {
      writeLine(process.stderr, JSON.stringify({ level: "warn", message }));
      return;
    }
    const c = getChalk();
    writeLine(process.stderr, c.yellow(`${c.bold("warning:")} ${message}`));
  },

  json(data: unknown): void {
    writeLine(process.stdout, JSON.stringify(data, null, 2));
  },

  /** Raw text, written whatever the settings */
  write(text: string): void {
    process.stdout.write(text);
  },
};
