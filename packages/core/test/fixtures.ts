import type { JsonObject } from "../src/types";

export const PLAYER_HEXES = [
  "#ff7edb",
  "#36f9f6",
  "#72f1b8",
  "#fede5d",
  "#f97e72",
  "#fe4450",
  "#2ee2fa",
  "#ff8b39",
];

/** Small three-variant palette: classic (identity), soft (+6) and high_contrast (-8) */
export function paletteSource(): JsonObject {
  return {
    $comment: "test palette",
    base: {
      background: { surface: "#241b2f", panel: "#1e1829" },
      foreground: { text: "#ffffff" },
      player: Object.fromEntries(PLAYER_HEXES.map((hex, i) => [String(i + 1), hex])),
    },
    syntax: {
      keyword: "#fede5d",
      comment: "#848bbd",
      string: "#ff8b39",
    },
    variants: {
      classic: {
        lightness_shift: 0,
        minimum_contrast: 4.5,
        contrast_reference: "background.surface",
      },
      soft: {
        lightness_shift: 6,
        minimum_contrast: 4.5,
        contrast_reference: "background.surface",
        overrides: { "syntax.string": "#FFA05C" },
      },
      high_contrast: {
        lightness_shift: -8,
        minimum_contrast: 7.0,
        contrast_reference: "background.surface",
      },
    },
  };
}

export const TEMPLATE_ROLES = [
  "background.surface",
  "background.panel",
  "foreground.text",
  ...PLAYER_HEXES.map((_, i) => `player.${i + 1}`),
  "syntax.keyword",
  "syntax.comment",
  "syntax.string",
];

export function templateSource(): JsonObject {
  return {
    $schema: "https://zed.dev/schema/themes/v0.2.0.json",
    name: "Test Theme",
    author: "tests",
    roles: [...TEMPLATE_ROLES],
    variants: {
      classic: { name: "Test Theme", appearance: "dark" },
      soft: { name: "Test Theme Soft", appearance: "dark" },
      high_contrast: { name: "Test Theme High Contrast", appearance: "dark" },
    },
    style: {
      $comment: "placeholders such as {{not.a.role}} in annotations are ignored",
      background: "{{background.panel}}",
      "editor.background": "{{background.surface}}",
      "editor.active_line.background": "{{background.panel@25%}}",
      text: "{{foreground.text}}",
      players: PLAYER_HEXES.map((_, i) => ({
        cursor: `{{player.${i + 1}}}`,
        background: `{{player.${i + 1}}}`,
        selection: `{{player.${i + 1}@40}}`,
      })),
    },
    syntax_colors: {
      keyword: "syntax.keyword",
      comment: "syntax.comment",
      "comment.doc": "syntax.comment",
      string: "syntax.string",
    },
    syntax_styles: {
      $comment: "italic comments",
      comment: { italic: true },
      "comment.doc": { italic: true },
      keyword: { bold: true },
      string: { underline: true },
    },
    contrast_rules: [
      { foreground: "text", background: "editor.background" },
      { foreground: "syntax:*", background: "editor.background" },
      { foreground: "syntax:syntax.comment", background: "editor.background", minimum: 3.0 },
    ],
  };
}

/** Palette with only the classic variant and the given syntax colors */
export function classicOnlyPalette(syntax: Record<string, string>): JsonObject {
  const source = paletteSource();
  return {
    ...source,
    syntax,
    variants: {
      classic: {
        lightness_shift: 0,
        minimum_contrast: 4.5,
        contrast_reference: "background.surface",
      },
    },
  };
}
