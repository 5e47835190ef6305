/**
 * Comma-separated flag parsing tests
 */

import { describe, it, expect } from "vitest";
import { parseList, parseSelectorList } from "../src/utils/args.js";
import { CliError } from "../src/errors.js";

describe("parseList", () => {
  it("splits, trims and drops empty entries", () => {
    expect(parseList(" a.yaml, b.yaml ,,c.yaml ")).toEqual(["a.yaml", "b.yaml", "c.yaml"]);
  });

  it("returns an empty list for a missing value", () => {
    expect(parseList(undefined)).toEqual([]);
    expect(parseList("")).toEqual([]);
  });
});

describe("parseSelectorList", () => {
  it("parses key=value pairs in order", () => {
    const selectors = parseSelectorList("environment=prod, region = us-east");
    expect(selectors).toEqual({ environment: "prod", region: "us-east" });
    expect(Object.keys(selectors)).toEqual(["environment", "region"]);
  });

  it("splits on the first equals sign only", () => {
    expect(parseSelectorList("expr=a=b")).toEqual({ expr: "a=b" });
  });

  it("rejects a pair without a key", () => {
    expect(() => parseSelectorList("environment")).toThrow(
      "Invalid selector format: environment (expected key=value)"
    );

    try {
      parseSelectorList("=prod");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CliError);
      if (err instanceof CliError) {
        expect(err.exitCode).toBe(2);
        expect(err.code).toBe("INVALID_ARGUMENT");
      }
    }
  });

  it("rejects a pair with an empty value", () => {
    expect(() => parseSelectorList("environment=prod,region=")).toThrow(
      "Invalid selector format: region= (expected key=value)"
    );
    expect(() => parseSelectorList("environment= ")).toThrow(
      "Invalid selector format: environment= (expected key=value)"
    );
  });
});
