/**
 * CLI error mapping and formatting tests
 */

import { describe, it, expect } from "vitest";
import { ConfigError, LabelPredicateError, ManifestError } from "@policysmith/core";
import { CliError, configError, isCliError, toCliError, usageError } from "../src/errors.js";
import { formatCliError } from "../src/formatter.js";

describe("toCliError", () => {
  it("passes CliError through", () => {
    const error = usageError("bad flag");
    expect(toCliError(error)).toBe(error);
  });

  it("maps ConfigError to exit code 3", () => {
    const error = toCliError(new ConfigError("Policy name is required", { field: "name" }));
    expect(error.code).toBe("CONFIG_ERROR");
    expect(error.exitCode).toBe(3);
    expect(error.message).toBe("Policy name is required");
  });

  it("maps ManifestError to exit code 4 with its location", () => {
    const error = toCliError(
      new ManifestError("Document 1 is not a mapping", { source: "cm.yaml", line: 4, column: 2 })
    );
    expect(error.code).toBe("MANIFEST_ERROR");
    expect(error.exitCode).toBe(4);
    expect(error.message).toBe("Document 1 is not a mapping (cm.yaml:4:2)");
  });

  it("does not repeat a source already named in the message", () => {
    const error = toCliError(
      new ManifestError("Manifest file cm.yaml contains no documents", { source: "cm.yaml" })
    );
    expect(error.message).toBe("Manifest file cm.yaml contains no documents");
  });

  it("maps LabelPredicateError to exit code 4 and keeps its suggestion", () => {
    const error = toCliError(
      new LabelPredicateError("bad operator", { index: 0, suggestion: "Use one of: In, NotIn" })
    );
    expect(error.code).toBe("LABEL_PREDICATE_ERROR");
    expect(error.exitCode).toBe(4);
    expect(error.suggestion).toBe("Use one of: In, NotIn");
  });

  it("maps other errors to INTERNAL_ERROR", () => {
    const error = toCliError(new Error("boom"));
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.exitCode).toBe(1);
  });

  it("maps non-errors to UNKNOWN_ERROR", () => {
    expect(toCliError("boom").code).toBe("UNKNOWN_ERROR");
  });
});

describe("isCliError", () => {
  it("recognises CliError instances", () => {
    expect(isCliError(configError("x"))).toBe(true);
    expect(isCliError(new Error("x"))).toBe(false);
    expect(isCliError(null)).toBe(false);
  });
});

describe("formatCliError", () => {
  const error = new CliError({
    code: "CONFIG_ERROR",
    message: "Config file not found: policy.yaml",
    suggestion: "Check the path passed to --config",
    exitCode: 3,
  });

  it("renders text with the suggestion on its own line", () => {
    expect(formatCliError(error, false)).toBe(
      "[CONFIG_ERROR] Config file not found: policy.yaml\nsuggestion: Check the path passed to --config"
    );
  });

  it("renders JSON", () => {
    expect(JSON.parse(formatCliError(error, true))).toEqual({
      code: "CONFIG_ERROR",
      message: "Config file not found: policy.yaml",
      suggestion: "Check the path passed to --config",
      exitCode: 3,
    });
  });
});
