// src/schemas/palette.ts
// Zod schemas for the palette source document (theme/palette.json)

import { z } from "zod";

/** Keys starting with '$' are annotations ($comment, $rationale) and never roles */
export const isAnnotationKey = (key: string): boolean => key.startsWith("$");

// ============ Basic Types ============

export const ColorGroupSchema = z.record(z.string(), z.string());

export const VariantSourceSchema = z.object({
  /** Signed CIE L* shift; 0 means identity */
  lightness_shift: z.number().min(-100).max(100),
  minimum_contrast: z.number().min(1).max(21),
  /** Role the derived colors are measured against */
  contrast_reference: z.string().min(1),
  overrides: ColorGroupSchema.default({}),
});

// ============ Document Schema ============

export const PaletteSourceSchema = z.object({
  $comment: z.string().optional(),
  /** Shared groups: background, foreground, border, terminal, player */
  base: z.record(z.string(), ColorGroupSchema),
  /** Classic syntax colors, the tier variants derive from */
  syntax: ColorGroupSchema,
  variants: z
    .record(z.string(), VariantSourceSchema)
    .refine((variants) => Object.keys(variants).length > 0, "at least one variant is required"),
});

export type VariantSource = z.infer<typeof VariantSourceSchema>;
export type PaletteSource = z.infer<typeof PaletteSourceSchema>;
