/**
 * Human-readable command output: "OK:", "FAIL:" and "WARN:" lines.
 */

import { FindingSeverity, type Finding } from "@synthwave84/theme-core";

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Collects lines instead of printing them */
export class BufferedIO implements CommandIO {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}

export function ok(message: string): string {
  return `OK: ${message}`;
}

export function fail(message: string): string {
  return `FAIL: ${message}`;
}

export function formatFinding(finding: Finding): string {
  return finding.severity === FindingSeverity.ERROR ? fail(finding.message) : `WARN: ${finding.message}`;
}
