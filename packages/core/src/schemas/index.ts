// src/schemas/index.ts
// Source document parsing shared by the palette store and the renderer

import type { z } from "zod";

import { SourceError } from "../core/ThemeErrors";

export * from "./palette";
export * from "./template";

/**
 * Validate raw JSON against a schema.
 *
 * @throws SourceError listing every issue as "path: message"
 */
export function parseSource<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  sourceName: string
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new SourceError(sourceName, issues);
  }
  return result.data;
}
