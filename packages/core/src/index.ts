/**
 * @synthwave84/theme-core
 *
 * Palette derivation and validation engine for the SynthWave '84 Zed theme.
 * This package provides:
 * - Color: hex parsing, WCAG luminance/contrast, CIE L* lightness shifts
 * - PaletteStore / VariantDeriver: base palette + per-variant derivation
 * - ThemeTemplate: placeholder template rendering
 * - Validator, DriftChecker, CoverageReporter
 * - ThemePipeline: the whole pass in one object
 */

// Core classes
export { Color, WCAG_AA, WCAG_AAA } from "./core/Color";
export type { AlphaInput } from "./core/Color";
export {
  contrastRatio,
  lightnessOf,
  parseAlpha,
  parseColor,
  relativeLuminance,
  shiftLightness,
  srgbToLinear,
  toLinear,
  withAlpha,
} from "./core/Color";
export { PaletteStore, SYNTAX_GROUP } from "./core/PaletteStore";
export type { VariantSpec } from "./core/PaletteStore";
export {
  VariantDeriver,
  ResolvedPalette,
  DEFAULT_MAX_REPAIR_STEPS,
  DEFAULT_REPAIR_STEP,
  applyDerivation,
  deriveColor,
  repairDirection,
  resolveReference,
} from "./core/VariantDeriver";
export type { DerivationComparison, DerivedColor, VariantDeriverOptions } from "./core/VariantDeriver";
export {
  ThemeTemplate,
  PLACEHOLDER_PATTERN,
  collectPlaceholders,
  renderSyntax,
  renderTheme,
  isNamedAlpha,
  renderVariant,
  resolveAlpha,
  resolveDeclaredRoles,
  serializeTheme,
  substitutePlaceholders,
} from "./core/TemplateRenderer";
export type { AlphaTable, PlaceholderRef } from "./core/TemplateRenderer";
export {
  HEX_COLOR_PATTERN,
  MIN_PLAYER_COLORS,
  expandContrastRules,
  validateContrast,
  validateStructure,
  validateTemplate,
  validateTheme,
} from "./core/Validator";
export type { ContrastPairing, ValidationContext } from "./core/Validator";
export { assertNoDrift, checkDrift, describeDrift, diffDocuments } from "./core/DriftChecker";
export type { DriftEntry, DriftKind } from "./core/DriftChecker";
export { compareCoverage, reportCoverage } from "./core/CoverageReporter";
export type { CoveragePolicy, CoverageReport } from "./core/CoverageReporter";
export { ThemePipeline } from "./core/ThemePipeline";
export type { ThemePipelineOptions } from "./core/ThemePipeline";

// Errors
export {
  CODE_TO_MESSAGE,
  CODE_TO_SEVERITY,
  ContrastUnattainableError,
  DriftDetectedError,
  ParseError,
  SourceError,
  ThemeError,
  UnresolvedRoleError,
  createFinding,
  isThemeError,
} from "./core/ThemeErrors";

// Schemas
export { PaletteSourceSchema, TemplateSourceSchema, isAnnotationKey, parseSource } from "./schemas";
export type {
  ContrastRule,
  PaletteSource,
  StyleFlags,
  TemplateSource,
  VariantDisplay,
  VariantSource,
} from "./schemas";

// Types
export { FindingSeverity, ThemeErrorCode, buildReport } from "./types";
export type {
  Appearance,
  Finding,
  FindingCategory,
  JsonObject,
  JsonValue,
  RenderedTheme,
  RoleSource,
  SyntaxStyle,
  ThemeFamilyDocument,
  ValidationReport,
} from "./types";
