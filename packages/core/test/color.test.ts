import { describe, expect, it } from "vitest";

import {
  Color,
  WCAG_AA,
  contrastRatio,
  lightnessOf,
  parseAlpha,
  relativeLuminance,
  shiftLightness,
  srgbToLinear,
} from "../src/core/Color";
import { ParseError } from "../src/core/ThemeErrors";
import { ThemeErrorCode } from "../src/types";

describe("Color", () => {
  // ===========================================================================
  // parse
  // ===========================================================================
  describe("parse", () => {
    it("normalizes to lowercase", () => {
      expect(Color.parse("#FF7EDB").toHex()).toBe("#ff7edb");
    });

    it("reads channels", () => {
      const color = Color.parse("#241b2f");
      expect([color.r, color.g, color.b]).toEqual([0x24, 0x1b, 0x2f]);
      expect(color.alpha).toBeUndefined();
    });

    it("keeps an alpha suffix", () => {
      const color = Color.parse("#ff7edb40");
      expect(color.alpha).toBe(0x40);
      expect(color.toHex()).toBe("#ff7edb40");
      expect(color.toRgbHex()).toBe("#ff7edb");
    });

    it.each([
      ["ff7edb", "expected a leading '#'"],
      ["#ff7ed", "expected 6 or 8 hex digits, got 5"],
      ["#ff7edb4", "expected 6 or 8 hex digits, got 7"],
      ["#gg7edb", "contains non-hex characters"],
    ])("rejects %s", (input, reason) => {
      expect(() => Color.parse(input)).toThrow(reason);
    });

    it("names the role in the error", () => {
      try {
        Color.parse("#12345", "syntax.keyword");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.code).toBe(ThemeErrorCode.PARSE_ERROR);
          expect(err.input).toBe("#12345");
          expect(err.message).toBe(
            "Invalid color '#12345' for role 'syntax.keyword': expected 6 or 8 hex digits, got 5"
          );
        }
      }
    });

    it("tryParse returns null for malformed input", () => {
      expect(Color.tryParse("nope")).toBeNull();
      expect(Color.tryParse("#ffffff")?.toHex()).toBe("#ffffff");
    });
  });

  describe("fromRgb", () => {
    it("rounds and clamps channels", () => {
      expect(Color.fromRgb(254.6, -3, 300).toHex()).toBe("#ff00ff");
    });
  });

  // ===========================================================================
  // alpha
  // ===========================================================================
  describe("withAlpha", () => {
    it.each([
      ["40", "#ff7edb40"],
      ["25%", "#ff7edb40"],
      ["100%", "#ff7edbff"],
      ["0%", "#ff7edb00"],
    ])("%s -> %s", (alpha, expected) => {
      expect(Color.parse("#ff7edb").withAlpha(alpha).toHex()).toBe(expected);
    });

    it("replaces an existing alpha", () => {
      expect(Color.parse("#ff7edb40").withAlpha(128).toHex()).toBe("#ff7edb80");
    });

    it("opaque drops the alpha", () => {
      expect(Color.parse("#ff7edb40").opaque().toHex()).toBe("#ff7edb");
    });
  });

  describe("parseAlpha", () => {
    it("rounds percentages to a byte", () => {
      expect(parseAlpha("50%")).toBe(128);
      expect(parseAlpha("12.5%")).toBe(32);
    });

    it.each(["101%", "4", "xyz"])("rejects %s", (alpha) => {
      expect(() => parseAlpha(alpha)).toThrow(ParseError);
    });

    it("rejects bytes out of range", () => {
      expect(() => parseAlpha(256)).toThrow(ParseError);
      expect(() => parseAlpha(1.5)).toThrow(ParseError);
    });
  });
});

// =============================================================================
// WCAG math
// =============================================================================
describe("luminance and contrast", () => {
  it("uses the sRGB transfer function", () => {
    expect(srgbToLinear(0)).toBe(0);
    expect(srgbToLinear(255)).toBe(1);
    expect(srgbToLinear(10)).toBeCloseTo(10 / 255 / 12.92, 10);
  });

  it("relative luminance of black and white", () => {
    expect(relativeLuminance(Color.parse("#000000"))).toBe(0);
    expect(relativeLuminance(Color.parse("#ffffff"))).toBeCloseTo(1, 10);
    expect(relativeLuminance(Color.parse("#fede5d"))).toBeCloseTo(0.741037, 5);
  });

  it("black on white is 21:1", () => {
    expect(contrastRatio(Color.parse("#000000"), Color.parse("#ffffff"))).toBeCloseTo(21, 10);
  });

  it("is symmetric", () => {
    const a = Color.parse("#fede5d");
    const b = Color.parse("#241b2f");
    expect(contrastRatio(a, b)).toBe(contrastRatio(b, a));
    expect(contrastRatio(a, b)).toBeCloseTo(12.4295, 3);
  });

  it("a color against itself is 1:1", () => {
    const c = Color.parse("#ff7edb");
    expect(contrastRatio(c, c)).toBe(1);
  });

  it("ignores alpha", () => {
    const bg = Color.parse("#241b2f");
    expect(contrastRatio(Color.parse("#fe445080"), bg)).toBe(contrastRatio(Color.parse("#fe4450"), bg));
  });

  it("white text on the classic surface clears both floors", () => {
    const ratio = contrastRatio(Color.parse("#ffffff"), Color.parse("#241b2f"));
    expect(ratio).toBeCloseTo(16.4986, 3);
    expect(ratio).toBeGreaterThanOrEqual(7);
  });

  it("classic comment clears AA on the editor background", () => {
    const ratio = contrastRatio(Color.parse("#848bbd"), Color.parse("#241b2f"));
    expect(ratio).toBeCloseTo(5.0352, 3);
    expect(ratio).toBeGreaterThanOrEqual(WCAG_AA);
  });
});

// =============================================================================
// Lightness shifts
// =============================================================================
describe("shiftLightness", () => {
  it("delta 0 returns the same color", () => {
    const color = Color.parse("#848bbd");
    expect(shiftLightness(color, 0)).toBe(color);
  });

  it("moves L* by the delta", () => {
    const color = Color.parse("#848bbd");
    const lighter = shiftLightness(color, 10);
    expect(Math.abs(lightnessOf(lighter) - (lightnessOf(color) + 10))).toBeLessThan(1);
    expect(relativeLuminance(lighter)).toBeGreaterThan(relativeLuminance(color));
  });

  it("negative deltas darken", () => {
    const color = Color.parse("#fede5d");
    expect(relativeLuminance(shiftLightness(color, -8))).toBeLessThan(relativeLuminance(color));
  });

  it("clamps at black", () => {
    expect(shiftLightness(Color.parse("#ff7edb"), -100).toHex()).toBe("#000000");
  });

  it("keeps the alpha byte", () => {
    expect(shiftLightness(Color.parse("#848bbd40"), 5).alpha).toBe(0x40);
  });

  it("is deterministic", () => {
    const color = Color.parse("#36f9f6");
    expect(shiftLightness(color, -8).toHex()).toBe(shiftLightness(color, -8).toHex());
  });
});
