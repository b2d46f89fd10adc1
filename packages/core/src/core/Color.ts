/**
 * Color.ts
 *
 * Immutable sRGB color with an optional alpha byte, plus the WCAG 2.x
 * luminance/contrast math and CIE L* lightness shifting used for variants.
 */

import { clampChroma, converter, type Lch, type Rgb } from "culori";

import { ParseError } from "./ThemeErrors";

const HEX_BODY = /^[0-9a-fA-F]+$/;
const PERCENT_ALPHA = /^(\d{1,3}(?:\.\d+)?)%$/;
const HEX_ALPHA = /^[0-9a-fA-F]{2}$/;

const toLch = converter("lch");
const toRgb = converter("rgb");

/** WCAG AA floor for body text */
export const WCAG_AA = 4.5;
/** WCAG AAA floor for body text */
export const WCAG_AAA = 7.0;

/**
 * Alpha request accepted by {@link Color.withAlpha}:
 * a byte (0-255), a two digit hex suffix ("40") or a percentage ("25%").
 */
export type AlphaInput = number | string;

export class Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  /** Alpha byte, undefined for plain #rrggbb colors */
  readonly alpha: number | undefined;

  private constructor(r: number, g: number, b: number, alpha?: number) {
    this.r = r;
    this.g = g;
    this.b = b;
    this.alpha = alpha;
  }

  /**
   * Parse `#rrggbb` or `#rrggbbaa`.
   *
   * @param role - Palette role, only used in the error message
   * @throws ParseError on a missing '#', wrong length or non-hex characters
   *
   * @example
   * Color.parse("#FF7EDB").toHex() // "#ff7edb"
   */
  static parse(input: string, role?: string): Color {
    if (!input.startsWith("#")) {
      throw new ParseError(input, "expected a leading '#'", role);
    }
    const body = input.slice(1);
    if (body.length !== 6 && body.length !== 8) {
      throw new ParseError(input, `expected 6 or 8 hex digits, got ${body.length}`, role);
    }
    if (!HEX_BODY.test(body)) {
      throw new ParseError(input, "contains non-hex characters", role);
    }

    const channel = (i: number) => parseInt(body.slice(i, i + 2), 16);
    return new Color(channel(0), channel(2), channel(4), body.length === 8 ? channel(6) : undefined);
  }

  /** Like {@link Color.parse} but returns null instead of throwing */
  static tryParse(input: string): Color | null {
    try {
      return Color.parse(input);
    } catch (err) {
      if (err instanceof ParseError) return null;
      throw err;
    }
  }

  static fromRgb(r: number, g: number, b: number, alpha?: number): Color {
    return new Color(toByte(r), toByte(g), toByte(b), alpha === undefined ? undefined : toByte(alpha));
  }

  /** `#rrggbb` plus the alpha suffix when present */
  toHex(): string {
    const rgb = this.toRgbHex();
    return this.alpha === undefined ? rgb : `${rgb}${byteToHex(this.alpha)}`;
  }

  /** `#rrggbb`, alpha dropped */
  toRgbHex(): string {
    return `#${byteToHex(this.r)}${byteToHex(this.g)}${byteToHex(this.b)}`;
  }

  toString(): string {
    return this.toHex();
  }

  equals(other: Color): boolean {
    return this.toHex() === other.toHex();
  }

  /** Linear-light channels in [0, 1] via the sRGB transfer function */
  toLinear(): [number, number, number] {
    return [srgbToLinear(this.r), srgbToLinear(this.g), srgbToLinear(this.b)];
  }

  /**
   * Return a copy with the alpha suffix appended or replaced. RGB is untouched.
   *
   * @example
   * Color.parse("#ff7edb").withAlpha("25%").toHex() // "#ff7edb40"
   */
  withAlpha(alpha: AlphaInput): Color {
    return new Color(this.r, this.g, this.b, parseAlpha(alpha));
  }

  /** Copy without the alpha suffix */
  opaque(): Color {
    return this.alpha === undefined ? this : new Color(this.r, this.g, this.b);
  }
}

// ============================================================================
// Pure Functions
// ============================================================================

export function parseColor(input: string): Color {
  return Color.parse(input);
}

export function toLinear(color: Color): [number, number, number] {
  return color.toLinear();
}

export function withAlpha(color: Color, alpha: AlphaInput): Color {
  return color.withAlpha(alpha);
}

/**
 * Convert an alpha request to a byte.
 *
 * @throws ParseError for anything that is not a byte, a hex pair or a percentage
 */
export function parseAlpha(alpha: AlphaInput): number {
  if (typeof alpha === "number") {
    if (!Number.isInteger(alpha) || alpha < 0 || alpha > 255) {
      throw new ParseError(String(alpha), "alpha byte must be an integer in 0-255");
    }
    return alpha;
  }

  const percent = PERCENT_ALPHA.exec(alpha);
  if (percent) {
    const value = Number(percent[1]);
    if (value > 100) {
      throw new ParseError(alpha, "alpha percentage above 100%");
    }
    return Math.round((value / 100) * 255);
  }
  if (HEX_ALPHA.test(alpha)) {
    return parseInt(alpha, 16);
  }
  throw new ParseError(alpha, "alpha must be a hex pair or a percentage");
}

export function srgbToLinear(channel: number): number {
  const c = channel / 255;
  if (c <= 0.04045) return c / 12.92;
  return ((c + 0.055) / 1.055) ** 2.4;
}

/** WCAG relative luminance; alpha is ignored */
export function relativeLuminance(color: Color): number {
  const [r, g, b] = color.toLinear();
  return 0.2126 * r + 0.7152 * g + 0.0722 * b;
}

/**
 * Compute WCAG 2.x contrast ratio between two colors.
 * Returns a value in [1, 21], independent of argument order.
 */
export function contrastRatio(a: Color, b: Color): number {
  const la = relativeLuminance(a);
  const lb = relativeLuminance(b);
  const lighter = Math.max(la, lb);
  const darker = Math.min(la, lb);
  return (lighter + 0.05) / (darker + 0.05);
}

/** CIE L* (D50) of a color, 0-100 */
export function lightnessOf(color: Color): number {
  return lchOf(color).l;
}

/**
 * Shift CIE L* by `delta`, clamped to [0, 100].
 * Hue is kept; chroma is reduced only as far as needed to stay inside sRGB.
 */
export function shiftLightness(color: Color, delta: number): Color {
  if (delta === 0) return color;

  const lch = lchOf(color);
  const shifted: Lch = { ...lch, l: Math.max(0, Math.min(100, lch.l + delta)) };
  const rgb = toRgb(clampChroma(shifted, "lch"));
  if (!rgb) {
    throw new ParseError(color.toHex(), "lightness shift left the sRGB gamut");
  }
  return Color.fromRgb(rgb.r * 255, rgb.g * 255, rgb.b * 255, color.alpha);
}

function lchOf(color: Color): Lch {
  const source: Rgb = { mode: "rgb", r: color.r / 255, g: color.g / 255, b: color.b / 255 };
  const lch = toLch(source);
  if (!lch) {
    throw new ParseError(color.toHex(), "cannot convert to CIE LCh");
  }
  return lch;
}

function toByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

function byteToHex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}
