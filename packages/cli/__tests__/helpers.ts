import { vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
  restore(): void;
}

/**
 * Capture everything written to process.stdout and process.stderr
 */
export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const outSpy = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  const errSpy = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });

  return {
    stdout,
    stderr,
    restore(): void {
      outSpy.mockRestore();
      errSpy.mockRestore();
    },
  };
}

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export const CONFIG_MAP_YAML = `apiVersion: v1
kind: ConfigMap
metadata:
  name: audit-settings
data:
  level: verbose
`;

export const NAMESPACE_YAML = `apiVersion: v1
kind: Namespace
metadata:
  name: team-a
`;
