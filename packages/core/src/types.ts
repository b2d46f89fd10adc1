/**
 * Core types for the theme engine - shared by the core modules and the CLI
 */

/** Error and finding codes */
export enum ThemeErrorCode {
  // Fatal: abort the current operation
  PARSE_ERROR = "PARSE_ERROR",
  SOURCE_INVALID = "SOURCE_INVALID",
  UNRESOLVED_ROLE = "UNRESOLVED_ROLE",
  CONTRAST_UNATTAINABLE = "CONTRAST_UNATTAINABLE",
  DRIFT_DETECTED = "DRIFT_DETECTED",

  // Collected: reported as findings
  STRUCTURAL_VALIDATION = "STRUCTURAL_VALIDATION",
  CONTRAST_VALIDATION = "CONTRAST_VALIDATION",
  COVERAGE_GAP = "COVERAGE_GAP",
}

export enum FindingSeverity {
  ERROR = "error",
  WARNING = "warning",
}

export type FindingCategory = "structural" | "contrast" | "coverage";

export interface Finding {
  severity: FindingSeverity;
  category: FindingCategory;
  code: ThemeErrorCode;
  message: string;
  /** Role, token or document path the finding is about */
  subject: string;
  /** Variant key, when the finding belongs to a single variant */
  variant?: string;
}

export interface ValidationReport {
  findings: Finding[];
  /** True when no finding has error severity */
  passed: boolean;
}

/** Where a resolved role's color came from */
export type RoleSource = "override" | "derived" | "base";

export type Appearance = "dark" | "light";

/** Zed syntax highlight style (`underline: true` is added only when flagged) */
export type SyntaxStyle = {
  color: string;
  font_style: "italic" | "normal";
  font_weight: 700 | null;
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RenderedTheme = {
  name: string;
  appearance: Appearance;
  style: JsonObject;
};

/** Zed theme family document */
export type ThemeFamilyDocument = {
  $schema: string;
  name: string;
  author: string;
  themes: RenderedTheme[];
};

export function buildReport(findings: Finding[]): ValidationReport {
  return {
    findings,
    passed: findings.every((f) => f.severity !== FindingSeverity.ERROR),
  };
}
