/**
 * File access for the commands: JSON reads and all-or-nothing writes.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import { SourceError } from "@synthwave84/theme-core";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Read and parse a JSON file.
 *
 * @throws SourceError when the file is missing or not valid JSON
 */
export function readJson(file: string): unknown {
  const result = readJsonIfExists(file);
  if (result === null) {
    throw new SourceError(file, ["file not found"]);
  }
  return result;
}

/**
 * Like {@link readJson}, but returns null for a missing file.
 */
export function readJsonIfExists(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceError(file, [`invalid JSON: ${reason}`]);
  }
}

export function readTextIfExists(file: string): string | null {
  try {
    return fs.readFileSync(file, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Write via a temp file in the same directory, then rename over the target,
 * so a reader never observes a partially written file.
 */
export function writeFileAtomic(file: string, contents: string): void {
  const dir = path.dirname(file);
  fs.mkdirSync(dir, { recursive: true });
  const temp = path.join(dir, `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(temp, contents, "utf8");
    fs.renameSync(temp, file);
  } catch (err) {
    fs.rmSync(temp, { force: true });
    throw err;
  }
}

/** Two-space JSON with a trailing newline */
export function toJsonText(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
