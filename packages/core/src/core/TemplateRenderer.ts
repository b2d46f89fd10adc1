/**
 * TemplateRenderer - expands the token template into Zed theme documents.
 *
 * Placeholders:
 * - {{role}}       role color as hex
 * - {{role@40}}    role color with a hex alpha suffix
 * - {{role@25%}}   role color with a percentage alpha (25% -> "40")
 * - {{role@name}}   role color with the variant's named alpha (display `alphas`);
 *                   a two-letter name made of hex digits reads as a hex pair
 *
 * Output is deterministic: roles resolve in the template's declared order,
 * skeleton keys keep their source order and syntax tokens are sorted.
 */

import type { Color } from "./Color";
import { SourceError, UnresolvedRoleError } from "./ThemeErrors";
import type { ResolvedPalette } from "./VariantDeriver";
import {
  TemplateSourceSchema,
  isAnnotationKey,
  parseSource,
  type StyleFlags,
  type TemplateSource,
  type VariantDisplay,
} from "../schemas";
import type { JsonObject, JsonValue, RenderedTheme, SyntaxStyle, ThemeFamilyDocument } from "../types";

export const PLACEHOLDER_PATTERN =
  /\{\{\s*([A-Za-z0-9_.-]+)(?:@([0-9A-Fa-f]{2}|\d{1,3}(?:\.\d+)?%|[A-Za-z_][A-Za-z0-9_]*))?\s*\}\}/g;

const LITERAL_ALPHA_PATTERN = /^(?:[0-9A-Fa-f]{2}|\d{1,3}(?:\.\d+)?%)$/;

/** Named alphas of one variant */
export type AlphaTable = Readonly<Record<string, string>>;

/** Any leftover "{{...}}" after substitution */
export const UNEXPANDED_PATTERN = /\{\{[^}]*\}\}/;

export class ThemeTemplate {
  readonly source: TemplateSource;

  private constructor(source: TemplateSource) {
    this.source = source;
  }

  /**
   * @throws SourceError when the document does not match the schema
   */
  static load(raw: unknown, sourceName = "template"): ThemeTemplate {
    return new ThemeTemplate(parseSource(TemplateSourceSchema, raw, sourceName));
  }

  get roles(): readonly string[] {
    return this.source.roles;
  }

  /** token -> role, annotations dropped, source order */
  tokenRoles(): Map<string, string> {
    const map = new Map<string, string>();
    for (const [token, role] of Object.entries(this.source.syntax_colors)) {
      if (!isAnnotationKey(token)) map.set(token, role);
    }
    return map;
  }

  /** token -> style flags, annotations dropped */
  tokenStyles(): Map<string, StyleFlags> {
    const map = new Map<string, StyleFlags>();
    for (const [token, flags] of Object.entries(this.source.syntax_styles)) {
      if (isAnnotationKey(token) || typeof flags === "string") continue;
      map.set(token, flags);
    }
    return map;
  }

  /** Mapped tokens, sorted */
  tokens(): string[] {
    return [...this.tokenRoles().keys()].sort();
  }

  /** Named alphas the style skeleton uses, sorted */
  alphaNames(): string[] {
    const names = new Set<string>();
    for (const { alpha } of collectPlaceholders(this.source.style, "style")) {
      if (alpha !== undefined && isNamedAlpha(alpha)) names.add(alpha);
    }
    return [...names].sort();
  }

  /** Every role a placeholder or the token table refers to */
  referencedRoles(): Set<string> {
    const roles = new Set<string>(this.tokenRoles().values());
    for (const { role } of collectPlaceholders(this.source.style, "style")) {
      roles.add(role);
    }
    return roles;
  }

  /**
   * @throws SourceError when the template has no display entry for the variant
   */
  display(variantKey: string): VariantDisplay {
    const display = this.source.variants[variantKey];
    if (!display) {
      throw new SourceError("template", [`variants.${variantKey}: no display entry for this variant`]);
    }
    return display;
  }
}

export function isNamedAlpha(alpha: string): boolean {
  return !LITERAL_ALPHA_PATTERN.test(alpha);
}

/**
 * Literal alphas pass through; names are looked up in the variant's table.
 *
 * @throws SourceError when the variant does not define the name
 */
export function resolveAlpha(alpha: string, alphas: AlphaTable, variant: string, path: string): string {
  if (!isNamedAlpha(alpha)) return alpha;
  if (!Object.hasOwn(alphas, alpha)) {
    throw new SourceError("template", [`${path}: alpha '${alpha}' is not defined for variant '${variant}'`]);
  }
  return alphas[alpha];
}

export interface PlaceholderRef {
  path: string;
  role: string;
  alpha?: string;
}

/**
 * List every placeholder in a JSON value with its path. Annotation keys are skipped.
 */
export function collectPlaceholders(value: JsonValue, path: string): PlaceholderRef[] {
  if (typeof value === "string") {
    const refs: PlaceholderRef[] = [];
    for (const match of value.matchAll(PLACEHOLDER_PATTERN)) {
      const ref: PlaceholderRef = { path, role: match[1] };
      if (match[2] !== undefined) ref.alpha = match[2];
      refs.push(ref);
    }
    return refs;
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => collectPlaceholders(item, `${path}[${i}]`));
  }
  if (value !== null && typeof value === "object") {
    return Object.entries(value)
      .filter(([key]) => !isAnnotationKey(key))
      .flatMap(([key, item]) => collectPlaceholders(item, `${path}.${key}`));
  }
  return [];
}

/**
 * Resolve the template's declared roles, in declared order.
 *
 * @throws UnresolvedRoleError for the first declared role the palette lacks
 */
export function resolveDeclaredRoles(template: ThemeTemplate, palette: ResolvedPalette): Map<string, Color> {
  const colors = new Map<string, Color>();
  for (const role of template.roles) {
    colors.set(role, palette.require(role, "template roles"));
  }
  return colors;
}

/**
 * Replace every placeholder in `value`.
 *
 * @throws UnresolvedRoleError when a placeholder names an undeclared role
 * @throws SourceError when a malformed placeholder survives substitution or
 *   a named alpha is not defined
 */
export function substitutePlaceholders(
  value: string,
  colors: ReadonlyMap<string, Color>,
  variant: string,
  path: string,
  alphas: AlphaTable = {}
): string {
  const resolved = value.replace(PLACEHOLDER_PATTERN, (_match: string, role: string, alpha?: string) => {
    const color = colors.get(role);
    if (!color) {
      throw new UnresolvedRoleError(role, variant, path);
    }
    return alpha === undefined
      ? color.toHex()
      : color.withAlpha(resolveAlpha(alpha, alphas, variant, path)).toHex();
  });

  if (UNEXPANDED_PATTERN.test(resolved)) {
    throw new SourceError("template", [`${path}: malformed placeholder in '${value}'`]);
  }
  return resolved;
}

export function renderValue(
  value: JsonValue,
  colors: ReadonlyMap<string, Color>,
  variant: string,
  path: string,
  alphas: AlphaTable = {}
): JsonValue {
  if (typeof value === "string") {
    return substitutePlaceholders(value, colors, variant, path, alphas);
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => renderValue(item, colors, variant, `${path}[${i}]`, alphas));
  }
  if (value !== null && typeof value === "object") {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (isAnnotationKey(key)) continue;
      result[key] = renderValue(item, colors, variant, `${path}.${key}`, alphas);
    }
    return result;
  }
  return value;
}

/**
 * Build the `syntax` block: one entry per mapped token, sorted by token.
 */
export function renderSyntax(
  template: ThemeTemplate,
  colors: ReadonlyMap<string, Color>,
  variant: string
): JsonObject {
  const roles = template.tokenRoles();
  const styles = template.tokenStyles();
  const syntax: JsonObject = {};

  for (const token of template.tokens()) {
    const role = roles.get(token) ?? "";
    const color = colors.get(role);
    if (!color) {
      throw new UnresolvedRoleError(role, variant, `syntax_colors.${token}`);
    }
    const flags: StyleFlags = styles.get(token) ?? {};
    const entry: SyntaxStyle = {
      color: color.toHex(),
      font_style: flags.italic ? "italic" : "normal",
      font_weight: flags.bold ? 700 : null,
    };
    syntax[token] = flags.underline ? { ...entry, underline: true } : entry;
  }
  return syntax;
}

/**
 * Render one variant's theme entry.
 */
export function renderVariant(template: ThemeTemplate, palette: ResolvedPalette): RenderedTheme {
  const display = template.display(palette.variant);
  const colors = resolveDeclaredRoles(template, palette);
  const alphas = display.alphas ?? {};

  const style: JsonObject = {};
  for (const [key, value] of Object.entries(template.source.style)) {
    if (isAnnotationKey(key)) continue;
    style[key] = renderValue(value, colors, palette.variant, `style.${key}`, alphas);
  }
  style.syntax = renderSyntax(template, colors, palette.variant);

  return { name: display.name, appearance: display.appearance, style };
}

/**
 * Render the theme family document, one theme per palette, in the given order.
 */
export function renderTheme(template: ThemeTemplate, palettes: readonly ResolvedPalette[]): ThemeFamilyDocument {
  return {
    $schema: template.source.$schema,
    name: template.source.name,
    author: template.source.author,
    themes: palettes.map((palette) => renderVariant(template, palette)),
  };
}

/** Two-space JSON with a trailing newline */
export function serializeTheme(document: ThemeFamilyDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
