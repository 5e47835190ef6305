/**
 * Parsing of comma-separated command-line values
 */
import { usageError } from "../errors.js";

/**
 * Split a comma-separated flag value, trimming entries and dropping empty ones
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Parse `key=value,key=value` cluster selectors. Key and value must both be
 * non-empty; the value may itself contain `=`, only the first one separates.
 */
export function parseSelectorList(value: string | undefined): Record<string, string> {
  const selectors: Record<string, string> = {};
  for (const pair of parseList(value)) {
    const separator = pair.indexOf("=");
    const key = separator > 0 ? pair.slice(0, separator).trim() : "";
    const selectorValue = separator > 0 ? pair.slice(separator + 1).trim() : "";
    if (!key || !selectorValue) {
      throw usageError(
        `Invalid selector format: ${pair} (expected key=value)`,
        "Example: --selectors environment=prod,region=us-east"
      );
    }
    selectors[key] = selectorValue;
  }
  return selectors;
}
