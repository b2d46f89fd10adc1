/**
 * Validator - structural and accessibility checks on a rendered theme document.
 *
 * Never stops at the first problem: every pass runs and all findings are
 * returned, so one run surfaces everything. Warnings never fail a run.
 */

import { Color, contrastRatio } from "./Color";
import { createFinding } from "./ThemeErrors";
import { UNEXPANDED_PATTERN, type ThemeTemplate } from "./TemplateRenderer";
import type { VariantSpec } from "./PaletteStore";
import type { ContrastRule } from "../schemas";
import { FindingSeverity, ThemeErrorCode, buildReport, type Finding, type ValidationReport } from "../types";

export const REQUIRED_ROOT_KEYS = ["$schema", "name", "themes"] as const;
export const REQUIRED_THEME_KEYS = ["name", "appearance", "style"] as const;
export const MIN_PLAYER_COLORS = 8;
export const HEX_COLOR_PATTERN = /^#[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/;

const SYNTAX_OPERAND = "syntax:";
const SYNTAX_WILDCARD = "syntax:*";

export interface ValidationContext {
  template: ThemeTemplate;
  /** Declared variants; themes[i] belongs to variants[i] */
  variants: readonly Pick<VariantSpec, "key" | "minimumContrast">[];
}

/** A foreground/background pairing with its floor */
export interface ContrastPairing {
  foreground: string;
  background: string;
  minimum?: number;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function structural(subject: string, message: string, variant?: string, warning = false): Finding {
  return createFinding(ThemeErrorCode.STRUCTURAL_VALIDATION, "structural", subject, message, {
    variant,
    severity: warning ? FindingSeverity.WARNING : FindingSeverity.ERROR,
  });
}

/** Every string in a JSON value with its path */
function collectStrings(value: unknown, path: string, out: [string, string][] = []): [string, string][] {
  if (typeof value === "string") {
    out.push([path, value]);
  } else if (Array.isArray(value)) {
    value.forEach((item, i) => collectStrings(item, `${path}[${i}]`, out));
  } else if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      collectStrings(item, `${path}.${key}`, out);
    }
  }
  return out;
}

// ============================================================================
// Structural pass
// ============================================================================

export function validateStructure(document: unknown, context: ValidationContext): Finding[] {
  if (!isRecord(document)) {
    return [structural("(root)", "Theme document is not a JSON object")];
  }

  const findings: Finding[] = [];
  for (const key of REQUIRED_ROOT_KEYS) {
    if (!Object.hasOwn(document, key)) findings.push(structural(key, `Missing ${key}`));
  }

  const themes = document.themes;
  if (Array.isArray(themes)) {
    if (themes.length !== context.variants.length) {
      findings.push(
        structural("themes", `Expected ${context.variants.length} themes, found ${themes.length}`)
      );
    }
    themes.forEach((theme, i) => {
      const variant = context.variants[i]?.key ?? `#${i}`;
      findings.push(...validateThemeEntry(theme, variant, context.template));
    });
  } else if (Object.hasOwn(document, "themes")) {
    findings.push(structural("themes", "themes is not an array"));
  }

  for (const [path, value] of collectStrings(document, "$")) {
    if (UNEXPANDED_PATTERN.test(value)) {
      findings.push(structural(path, `${path}: unexpanded placeholder '${value}'`));
    } else if (value.startsWith("#") && !HEX_COLOR_PATTERN.test(value)) {
      findings.push(structural(path, `${path}: invalid color '${value}'`));
    }
  }

  return findings;
}

function validateThemeEntry(theme: unknown, variant: string, template: ThemeTemplate): Finding[] {
  if (!isRecord(theme)) {
    return [structural(variant, `Theme ${variant} is not an object`, variant)];
  }

  const findings: Finding[] = [];
  for (const key of REQUIRED_THEME_KEYS) {
    if (!Object.hasOwn(theme, key)) {
      findings.push(structural(key, `Theme ${variant}: missing ${key}`, variant));
    }
  }

  const style = theme.style;
  if (!isRecord(style)) {
    if (Object.hasOwn(theme, "style")) {
      findings.push(structural("style", `Theme ${variant}: style is not an object`, variant));
    }
    return findings;
  }

  const skeletonKeys = Object.keys(template.source.style).filter((k) => !k.startsWith("$"));
  for (const key of skeletonKeys) {
    if (!Object.hasOwn(style, key)) {
      findings.push(structural(`style.${key}`, `Theme ${variant}: missing style.${key}`, variant));
    }
  }
  const known = new Set([...skeletonKeys, "syntax"]);
  for (const key of Object.keys(style)) {
    if (!known.has(key)) {
      findings.push(
        structural(`style.${key}`, `Theme ${variant}: style.${key} is not in the template`, variant, true)
      );
    }
  }

  const players = style.players;
  const playerCount = Array.isArray(players) ? players.length : 0;
  if (playerCount < MIN_PLAYER_COLORS) {
    findings.push(
      structural(
        "style.players",
        `Theme ${variant}: only ${playerCount} player colors (need ${MIN_PLAYER_COLORS})`,
        variant
      )
    );
  }

  const syntax = style.syntax;
  if (!isRecord(syntax)) {
    findings.push(structural("style.syntax", `Theme ${variant}: missing style.syntax`, variant));
    return findings;
  }
  for (const [token, role] of template.tokenRoles()) {
    const entry = Object.hasOwn(syntax, token) ? syntax[token] : undefined;
    const color = isRecord(entry) ? entry.color : undefined;
    if (typeof color !== "string" || Color.tryParse(color) === null) {
      findings.push(
        structural(token, `Theme ${variant}: token '${token}' (${role}) has no valid color`, variant)
      );
    }
  }

  return findings;
}

/**
 * Template-level checks: every mapped or placeholder role is declared and
 * every named alpha is defined by each variant;
 * declared roles nobody uses and styled tokens without a color are warnings.
 */
export function validateTemplate(template: ThemeTemplate): Finding[] {
  const findings: Finding[] = [];
  const declared = new Set(template.roles);
  const referenced = template.referencedRoles();

  for (const role of referenced) {
    if (!declared.has(role)) {
      findings.push(structural(role, `Role '${role}' is referenced but not declared in roles`));
    }
  }
  for (const role of declared) {
    if (!referenced.has(role)) {
      findings.push(structural(role, `Declared role '${role}' is never referenced`, undefined, true));
    }
  }

  for (const name of template.alphaNames()) {
    for (const [key, display] of Object.entries(template.source.variants)) {
      const alphas = display.alphas ?? {};
      if (!Object.hasOwn(alphas, name)) {
        findings.push(structural(name, `Variant '${key}' does not define alpha '${name}'`, key));
      }
    }
  }

  const mapped = template.tokenRoles();
  for (const token of template.tokenStyles().keys()) {
    if (!mapped.has(token)) {
      findings.push(
        structural(token, `Token '${token}' has a style but no color mapping`, undefined, true)
      );
    }
  }
  return findings;
}

// ============================================================================
// Accessibility pass
// ============================================================================

/**
 * Expand contrast rules into concrete pairings. "syntax:*" becomes one pairing
 * per mapped role; a specific rule replaces the wildcard's pairing.
 */
export function expandContrastRules(template: ThemeTemplate): ContrastPairing[] {
  const rules: readonly ContrastRule[] = template.source.contrast_rules;
  const syntaxRoles = [...new Set(template.tokens().map((t) => template.tokenRoles().get(t) ?? ""))];
  const pairings = new Map<string, ContrastPairing>();

  const put = (foreground: string, rule: ContrastRule) => {
    const pairing: ContrastPairing = { foreground, background: rule.background };
    if (rule.minimum !== undefined) pairing.minimum = rule.minimum;
    pairings.set(`${foreground}|${rule.background}`, pairing);
  };

  for (const rule of rules) {
    if (rule.foreground !== SYNTAX_WILDCARD) continue;
    for (const role of syntaxRoles) put(`${SYNTAX_OPERAND}${role}`, rule);
  }
  for (const rule of rules) {
    if (rule.foreground !== SYNTAX_WILDCARD) put(rule.foreground, rule);
  }
  return [...pairings.values()];
}

/** Display name for an operand: the role for syntax operands, else the style key */
function operandSubject(operand: string): string {
  return operand.startsWith(SYNTAX_OPERAND) ? operand.slice(SYNTAX_OPERAND.length) : operand;
}

/**
 * Colors an operand stands for: one style value, or every token mapped to a
 * syntax role. Null when any of them is missing or malformed.
 */
function resolveOperand(style: UnknownRecord, operand: string, template: ThemeTemplate): Color[] | null {
  if (!operand.startsWith(SYNTAX_OPERAND)) {
    const value = Object.hasOwn(style, operand) ? style[operand] : undefined;
    const color = typeof value === "string" ? Color.tryParse(value) : null;
    return color ? [color] : null;
  }

  const role = operand.slice(SYNTAX_OPERAND.length);
  const tokens = [...template.tokenRoles()].filter(([, r]) => r === role).map(([token]) => token);
  const syntax = style.syntax;
  if (tokens.length === 0 || !isRecord(syntax)) return null;

  const colors: Color[] = [];
  for (const token of tokens) {
    const entry = Object.hasOwn(syntax, token) ? syntax[token] : undefined;
    const value = isRecord(entry) ? entry.color : undefined;
    const color = typeof value === "string" ? Color.tryParse(value) : null;
    if (!color) return null;
    colors.push(color);
  }
  return colors;
}

/** Lowest ratio over every foreground/background combination */
function worstRatio(foregrounds: Color[], backgrounds: Color[]): number {
  return Math.min(...foregrounds.flatMap((fg) => backgrounds.map((bg) => contrastRatio(fg, bg))));
}

export function validateContrast(document: unknown, context: ValidationContext): Finding[] {
  if (!isRecord(document) || !Array.isArray(document.themes)) return [];

  const findings: Finding[] = [];
  const pairings = expandContrastRules(context.template);

  document.themes.forEach((theme: unknown, i: number) => {
    const variant = context.variants[i];
    if (!variant || !isRecord(theme) || !isRecord(theme.style)) return;
    const style = theme.style;
    const name = typeof theme.name === "string" ? theme.name : variant.key;

    for (const pairing of pairings) {
      const fg = resolveOperand(style, pairing.foreground, context.template);
      const bg = resolveOperand(style, pairing.background, context.template);
      const subject = operandSubject(pairing.foreground);
      if (!fg || !bg) {
        findings.push(
          structural(
            subject,
            `${name}: cannot resolve contrast pairing ${pairing.foreground} on ${pairing.background}`,
            variant.key
          )
        );
        continue;
      }

      const floor = pairing.minimum ?? variant.minimumContrast;
      const ratio = worstRatio(fg, bg);
      if (ratio < floor) {
        findings.push(
          createFinding(
            ThemeErrorCode.CONTRAST_VALIDATION,
            "contrast",
            subject,
            `${name}: ${subject} contrast ${ratio.toFixed(2)}:1 < ${floor.toFixed(1)}:1 ` +
              `on ${operandSubject(pairing.background)}`,
            { variant: variant.key }
          )
        );
      }
    }
  });

  return findings;
}

/**
 * Run every pass and collect all findings.
 */
export function validateTheme(document: unknown, context: ValidationContext): ValidationReport {
  return buildReport([
    ...validateStructure(document, context),
    ...validateTemplate(context.template),
    ...validateContrast(document, context),
  ]);
}
