/**
 * VariantDeriver - computes each variant's palette from the shared base.
 *
 * Two phases per syntax role:
 * 1. Shift: move CIE L* by the variant's signed delta (uniform across roles)
 * 2. Repair: if the shifted color misses the variant's contrast floor against
 *    its reference role, keep stepping L* away from the reference until the
 *    floor is met or the step bound runs out (ContrastUnattainableError)
 *
 * Overrides always win and are used verbatim. A zero shift is the identity
 * transform (classic).
 */

import { Color, contrastRatio, shiftLightness } from "./Color";
import { PaletteStore, type VariantSpec } from "./PaletteStore";
import { ContrastUnattainableError, UnresolvedRoleError } from "./ThemeErrors";
import type { PaletteSource } from "../schemas";
import type { RoleSource } from "../types";

/** L* units per repair step */
export const DEFAULT_REPAIR_STEP = 1;
/** Repair steps before giving up; 100 steps of 1 L* cover the whole axis */
export const DEFAULT_MAX_REPAIR_STEPS = 100;

const WHITE = Color.parse("#ffffff");
const BLACK = Color.parse("#000000");

export interface VariantDeriverOptions {
  repairStep?: number;
  maxRepairSteps?: number;
  /** Enable debug logging */
  debug?: boolean;
}

export interface DerivedColor {
  color: Color;
  /** Contrast against the variant's reference */
  ratio: number;
  /** Repair steps taken after the initial shift */
  repairSteps: number;
}

/** One row of the manual vs computed comparison */
export interface DerivationComparison {
  variant: string;
  role: string;
  /** Color the palette source currently yields (override or base) */
  manual: Color;
  derived: Color;
  manualRatio: number;
  derivedRatio: number;
  matches: boolean;
}

interface ResolvedEntry {
  color: Color;
  source: RoleSource;
}

/**
 * A variant's resolved palette. Role order is fixed: base roles, syntax roles,
 * then roles only the variant's overrides define.
 */
export class ResolvedPalette {
  readonly variant: string;
  private readonly entries: Map<string, ResolvedEntry>;

  constructor(variant: string, entries: Map<string, ResolvedEntry>) {
    this.variant = variant;
    this.entries = entries;
  }

  has(role: string): boolean {
    return this.entries.has(role);
  }

  get(role: string): Color | undefined {
    return this.entries.get(role)?.color;
  }

  /**
   * @throws UnresolvedRoleError when the role is absent
   */
  require(role: string, context?: string): Color {
    const color = this.get(role);
    if (!color) {
      throw new UnresolvedRoleError(role, this.variant, context);
    }
    return color;
  }

  sourceOf(role: string): RoleSource | undefined {
    return this.entries.get(role)?.source;
  }

  roles(): string[] {
    return [...this.entries.keys()];
  }

  /** role -> hex, in role order */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [role, entry] of this.entries) {
      record[role] = entry.color.toHex();
    }
    return record;
  }
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Direction that raises contrast against `reference`: +1 lightens, -1 darkens.
 */
export function repairDirection(reference: Color): 1 | -1 {
  return contrastRatio(WHITE, reference) >= contrastRatio(BLACK, reference) ? 1 : -1;
}

/**
 * Derive one role's color for a variant. Overrides are not consulted here.
 *
 * @throws ContrastUnattainableError when the floor is not met within the step bound
 */
export function deriveColor(
  base: Color,
  reference: Color,
  variant: Pick<VariantSpec, "key" | "lightnessShift" | "minimumContrast">,
  role: string,
  options: Pick<VariantDeriverOptions, "repairStep" | "maxRepairSteps"> = {}
): DerivedColor {
  if (variant.lightnessShift === 0) {
    return { color: base, ratio: contrastRatio(base, reference), repairSteps: 0 };
  }

  const shifted = shiftLightness(base, variant.lightnessShift);
  const shiftedRatio = contrastRatio(shifted, reference);
  if (shiftedRatio >= variant.minimumContrast) {
    return { color: shifted, ratio: shiftedRatio, repairSteps: 0 };
  }

  const step = (options.repairStep ?? DEFAULT_REPAIR_STEP) * repairDirection(reference);
  const maxSteps = options.maxRepairSteps ?? DEFAULT_MAX_REPAIR_STEPS;
  let bestRatio = shiftedRatio;

  for (let i = 1; i <= maxSteps; i++) {
    const candidate = shiftLightness(base, variant.lightnessShift + step * i);
    const ratio = contrastRatio(candidate, reference);
    if (ratio >= variant.minimumContrast) {
      return { color: candidate, ratio, repairSteps: i };
    }
    bestRatio = Math.max(bestRatio, ratio);
  }

  throw new ContrastUnattainableError(role, variant.key, bestRatio, variant.minimumContrast);
}

/**
 * Resolve the variant's reference role: override, then base, then syntax.
 *
 * @throws UnresolvedRoleError when the palette does not define it
 */
export function resolveReference(store: PaletteStore, variant: VariantSpec): Color {
  const reference = variant.overrides.get(variant.contrastReference) ?? store.colorOf(variant.contrastReference);
  if (!reference) {
    throw new UnresolvedRoleError(variant.contrastReference, variant.key, "contrast_reference");
  }
  return reference;
}

// ============================================================================
// VariantDeriver
// ============================================================================

export class VariantDeriver {
  private readonly store: PaletteStore;
  private readonly repairStep: number;
  private readonly maxRepairSteps: number;
  private readonly debug: boolean;

  constructor(store: PaletteStore, options: VariantDeriverOptions = {}) {
    this.store = store;
    this.repairStep = options.repairStep ?? DEFAULT_REPAIR_STEP;
    this.maxRepairSteps = options.maxRepairSteps ?? DEFAULT_MAX_REPAIR_STEPS;
    this.debug = options.debug ?? false;
  }

  /**
   * Resolve every role for one variant. Lookup order: override, derived, base.
   */
  derive(variantKey: string): ResolvedPalette {
    const variant = this.store.variant(variantKey);
    const reference = resolveReference(this.store, variant);
    const entries = new Map<string, ResolvedEntry>();

    for (const [role, color] of this.store.baseRoles) {
      const override = variant.overrides.get(role);
      entries.set(role, override ? { color: override, source: "override" } : { color, source: "base" });
    }

    for (const [role, base] of this.store.syntaxRoles) {
      const override = variant.overrides.get(role);
      if (override) {
        entries.set(role, { color: override, source: "override" });
        continue;
      }
      if (variant.lightnessShift === 0) {
        entries.set(role, { color: base, source: "base" });
        continue;
      }

      const derived = deriveColor(base, reference, variant, role, this.repairOptions());
      entries.set(role, { color: derived.color, source: "derived" });
      this.log(
        `${variant.key} ${role}: ${base.toHex()} -> ${derived.color.toHex()} ` +
          `(${derived.ratio.toFixed(2)}:1, ${derived.repairSteps} repair steps)`
      );
    }

    // Roles that only exist as overrides
    for (const [role, color] of variant.overrides) {
      if (!entries.has(role)) {
        entries.set(role, { color, source: "override" });
      }
    }

    return new ResolvedPalette(variant.key, entries);
  }

  /** Resolved palettes for every declared variant, in declaration order */
  deriveAll(): ResolvedPalette[] {
    return this.store.variantKeys.map((key) => this.derive(key));
  }

  /**
   * Compare what the palette source yields today with what derivation would
   * compute, for every syntax role of every shifted variant.
   */
  compare(): DerivationComparison[] {
    const rows: DerivationComparison[] = [];
    for (const variant of this.store.variants) {
      if (variant.lightnessShift === 0) continue;
      const reference = resolveReference(this.store, variant);

      for (const [role, base] of this.store.syntaxRoles) {
        const manual = variant.overrides.get(role) ?? base;
        const derived = deriveColor(base, reference, variant, role, this.repairOptions()).color;
        rows.push({
          variant: variant.key,
          role,
          manual,
          derived,
          manualRatio: contrastRatio(manual, reference),
          derivedRatio: contrastRatio(derived, reference),
          matches: manual.equals(derived),
        });
      }
    }
    return rows;
  }

  private repairOptions(): Pick<VariantDeriverOptions, "repairStep" | "maxRepairSteps"> {
    return { repairStep: this.repairStep, maxRepairSteps: this.maxRepairSteps };
  }

  private log(message: string): void {
    if (this.debug) {
      console.debug(`[VariantDeriver] ${message}`);
    }
  }
}

/**
 * Return a new palette source whose shifted variants carry the derived syntax
 * colors as overrides. The input document is not modified.
 */
export function applyDerivation(
  source: PaletteSource,
  options: VariantDeriverOptions = {}
): PaletteSource {
  const store = PaletteStore.fromSource(source);
  const variants: PaletteSource["variants"] = {};

  for (const [key, variant] of Object.entries(source.variants)) {
    const overrides = { ...variant.overrides };
    if (store.hasVariant(key) && variant.lightness_shift !== 0) {
      const spec = store.variant(key);
      const reference = resolveReference(store, spec);
      for (const [role, base] of store.syntaxRoles) {
        overrides[role] = deriveColor(base, reference, spec, role, options).color.toHex();
      }
    }
    variants[key] = { ...variant, overrides };
  }

  return { ...source, variants };
}
