/**
 * DriftChecker - structural diff between a fresh generation and the committed
 * artifact. Key by key, value by value; formatting and hex letter case are
 * ignored so only real differences are reported.
 */

import { DriftDetectedError } from "./ThemeErrors";
import { HEX_COLOR_PATTERN } from "./Validator";
import type { JsonValue } from "../types";

export type DriftKind = "missing" | "unexpected" | "changed";

export interface DriftEntry {
  /** JSON path, e.g. "$.themes[1].style.syntax.keyword.color" */
  path: string;
  kind: DriftKind;
  expected?: unknown;
  actual?: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sameScalar(expected: unknown, actual: unknown): boolean {
  if (
    typeof expected === "string" &&
    typeof actual === "string" &&
    HEX_COLOR_PATTERN.test(expected) &&
    HEX_COLOR_PATTERN.test(actual)
  ) {
    return expected.toLowerCase() === actual.toLowerCase();
  }
  return Object.is(expected, actual);
}

/**
 * Diff `actual` against `expected`. An empty result means no drift.
 */
export function diffDocuments(expected: JsonValue, actual: unknown, path = "$"): DriftEntry[] {
  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) {
      return [{ path, kind: "changed", expected, actual }];
    }
    const entries: DriftEntry[] = [];
    const length = Math.max(expected.length, actual.length);
    for (let i = 0; i < length; i++) {
      const itemPath = `${path}[${i}]`;
      if (i >= actual.length) {
        entries.push({ path: itemPath, kind: "missing", expected: expected[i] });
      } else if (i >= expected.length) {
        entries.push({ path: itemPath, kind: "unexpected", actual: actual[i] });
      } else {
        entries.push(...diffDocuments(expected[i], actual[i], itemPath));
      }
    }
    return entries;
  }

  if (isPlainObject(expected)) {
    if (!isPlainObject(actual)) {
      return [{ path, kind: "changed", expected, actual }];
    }
    const entries: DriftEntry[] = [];
    for (const [key, value] of Object.entries(expected)) {
      const keyPath = `${path}.${key}`;
      if (!Object.hasOwn(actual, key)) {
        entries.push({ path: keyPath, kind: "missing", expected: value });
      } else {
        entries.push(...diffDocuments(value, actual[key], keyPath));
      }
    }
    for (const key of Object.keys(actual)) {
      if (!Object.hasOwn(expected, key)) {
        entries.push({ path: `${path}.${key}`, kind: "unexpected", actual: actual[key] });
      }
    }
    return entries;
  }

  return sameScalar(expected, actual) ? [] : [{ path, kind: "changed", expected, actual }];
}

/**
 * Compare a fresh document with the committed one; `null` means no artifact.
 */
export function checkDrift(generated: JsonValue, committed: unknown): DriftEntry[] {
  if (committed === null) {
    return [{ path: "$", kind: "missing", expected: "generated theme document" }];
  }
  return diffDocuments(generated, committed);
}

/**
 * @throws DriftDetectedError when any difference exists
 */
export function assertNoDrift(generated: JsonValue, committed: unknown): void {
  const entries = checkDrift(generated, committed);
  if (entries.length > 0) {
    throw new DriftDetectedError(entries.map((e) => e.path));
  }
}

export function describeDrift(entry: DriftEntry): string {
  switch (entry.kind) {
    case "missing":
      return `${entry.path}: missing (expected ${JSON.stringify(entry.expected)})`;
    case "unexpected":
      return `${entry.path}: unexpected ${JSON.stringify(entry.actual)}`;
    case "changed":
      return `${entry.path}: expected ${JSON.stringify(entry.expected)}, found ${JSON.stringify(entry.actual)}`;
  }
}
