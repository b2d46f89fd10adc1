/**
 * PaletteStore - in-memory palette: shared base roles, classic syntax roles
 * and the declared variants with their sparse override maps.
 *
 * Roles are dotted names built from the source groups
 * ("background.surface", "syntax.keyword", "player.1").
 */

import { Color } from "./Color";
import { SourceError } from "./ThemeErrors";
import {
  PaletteSourceSchema,
  isAnnotationKey,
  parseSource,
  type PaletteSource,
} from "../schemas";

export const SYNTAX_GROUP = "syntax";

export interface VariantSpec {
  key: string;
  /** Signed CIE L* shift; 0 is the identity transform */
  lightnessShift: number;
  minimumContrast: number;
  contrastReference: string;
  /** Roles used verbatim, bypassing derivation */
  overrides: ReadonlyMap<string, Color>;
}

export class PaletteStore {
  /** Shared roles, in source declaration order */
  readonly baseRoles: ReadonlyMap<string, Color>;
  /** Classic syntax roles, in source declaration order */
  readonly syntaxRoles: ReadonlyMap<string, Color>;
  readonly variants: readonly VariantSpec[];

  private constructor(
    baseRoles: Map<string, Color>,
    syntaxRoles: Map<string, Color>,
    variants: VariantSpec[]
  ) {
    this.baseRoles = baseRoles;
    this.syntaxRoles = syntaxRoles;
    this.variants = variants;
  }

  /**
   * Validate and load a palette source document.
   *
   * @throws SourceError when the document does not match the schema
   * @throws ParseError naming the role of the first malformed color
   */
  static load(raw: unknown, sourceName = "palette"): PaletteStore {
    return PaletteStore.fromSource(parseSource(PaletteSourceSchema, raw, sourceName));
  }

  static fromSource(source: PaletteSource): PaletteStore {
    const baseRoles = new Map<string, Color>();
    for (const [group, entries] of Object.entries(source.base)) {
      if (isAnnotationKey(group)) continue;
      for (const [key, hex] of Object.entries(entries)) {
        if (isAnnotationKey(key)) continue;
        const role = `${group}.${key}`;
        baseRoles.set(role, Color.parse(hex, role));
      }
    }

    const syntaxRoles = new Map<string, Color>();
    for (const [key, hex] of Object.entries(source.syntax)) {
      if (isAnnotationKey(key)) continue;
      const role = `${SYNTAX_GROUP}.${key}`;
      syntaxRoles.set(role, Color.parse(hex, role));
    }

    const variants: VariantSpec[] = Object.entries(source.variants)
      .filter(([key]) => !isAnnotationKey(key))
      .map(([key, variant]) => {
        const overrides = new Map<string, Color>();
        for (const [role, hex] of Object.entries(variant.overrides)) {
          if (isAnnotationKey(role)) continue;
          overrides.set(role, Color.parse(hex, `${key}:${role}`));
        }
        return {
          key,
          lightnessShift: variant.lightness_shift,
          minimumContrast: variant.minimum_contrast,
          contrastReference: variant.contrast_reference,
          overrides,
        };
      });

    return new PaletteStore(baseRoles, syntaxRoles, variants);
  }

  get variantKeys(): string[] {
    return this.variants.map((v) => v.key);
  }

  hasVariant(key: string): boolean {
    return this.variants.some((v) => v.key === key);
  }

  /**
   * @throws SourceError when the variant is not declared
   */
  variant(key: string): VariantSpec {
    const variant = this.variants.find((v) => v.key === key);
    if (!variant) {
      throw new SourceError("palette", [`variants.${key}: variant is not declared`]);
    }
    return variant;
  }

  /** Base or syntax color, ignoring variant overrides */
  colorOf(role: string): Color | undefined {
    return this.baseRoles.get(role) ?? this.syntaxRoles.get(role);
  }

  /** Every role the palette defines, base first, then syntax */
  allRoles(): string[] {
    return [...this.baseRoles.keys(), ...this.syntaxRoles.keys()];
  }
}
