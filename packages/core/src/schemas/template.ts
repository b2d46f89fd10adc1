// src/schemas/template.ts
// Zod schemas for the template source document (theme/template.json)

import { z } from "zod";

import type { JsonValue } from "../types";

// ============ Basic Types ============

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const StyleFlagsSchema = z
  .object({
    italic: z.boolean().optional(),
    bold: z.boolean().optional(),
    underline: z.boolean().optional(),
  })
  .strict();

/** Alpha as a hex pair ("80") or a percentage ("50%") */
export const AlphaValueSchema = z
  .string()
  .regex(/^(?:[0-9A-Fa-f]{2}|\d{1,3}(?:\.\d+)?%)$/, "expected a hex pair or a percentage");

export const VariantDisplaySchema = z.object({
  name: z.string().min(1),
  appearance: z.enum(["dark", "light"]),
  /** Named alphas for {{role@name}} placeholders, e.g. { "line_number": "80" } */
  alphas: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/), AlphaValueSchema).optional(),
});

/**
 * Operands are style keys ("text", "editor.background") or syntax roles:
 * "syntax:syntax.comment" for one role, "syntax:*" for every mapped role.
 */
export const ContrastRuleSchema = z.object({
  foreground: z.string().min(1),
  background: z.string().min(1),
  /** Defaults to the variant's minimum contrast */
  minimum: z.number().min(1).max(21).optional(),
});

// ============ Document Schema ============

export const TemplateSourceSchema = z.object({
  $schema: z.string().min(1),
  $comment: z.string().optional(),
  name: z.string().min(1),
  author: z.string(),
  /** Declared role list; fixes resolution order */
  roles: z.array(z.string().min(1)).min(1),
  variants: z.record(z.string(), VariantDisplaySchema),
  /** Style skeleton with {{role}}, {{role@40}} and {{role@25%}} placeholders */
  style: z.record(z.string(), JsonValueSchema),
  /** token -> role */
  syntax_colors: z.record(z.string(), z.string()),
  /** token -> style flags */
  syntax_styles: z.record(z.string(), z.union([StyleFlagsSchema, z.string()])).default({}),
  contrast_rules: z.array(ContrastRuleSchema).default([]),
});

export type StyleFlags = z.infer<typeof StyleFlagsSchema>;
export type VariantDisplay = z.infer<typeof VariantDisplaySchema>;
export type ContrastRule = z.infer<typeof ContrastRuleSchema>;
export type TemplateSource = z.infer<typeof TemplateSourceSchema>;
