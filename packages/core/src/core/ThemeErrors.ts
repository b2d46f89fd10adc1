/**
 * ThemeErrors - error codes, default severities and the fatal error classes
 *
 * Two kinds of problems:
 * - Fatal (ParseError, SourceError, UnresolvedRoleError, ContrastUnattainableError,
 *   DriftDetectedError): thrown, abort the operation before anything is written
 * - Collected (structural, contrast, coverage): returned as findings so one run
 *   reports every problem
 */

import { FindingSeverity, ThemeErrorCode, type Finding, type FindingCategory } from "../types";

/** Maps error codes to their default severity */
export const CODE_TO_SEVERITY: Record<ThemeErrorCode, FindingSeverity> = {
  [ThemeErrorCode.PARSE_ERROR]: FindingSeverity.ERROR,
  [ThemeErrorCode.SOURCE_INVALID]: FindingSeverity.ERROR,
  [ThemeErrorCode.UNRESOLVED_ROLE]: FindingSeverity.ERROR,
  [ThemeErrorCode.CONTRAST_UNATTAINABLE]: FindingSeverity.ERROR,
  [ThemeErrorCode.DRIFT_DETECTED]: FindingSeverity.ERROR,
  [ThemeErrorCode.STRUCTURAL_VALIDATION]: FindingSeverity.ERROR,
  [ThemeErrorCode.CONTRAST_VALIDATION]: FindingSeverity.ERROR,
  // Policy decides; missing reference tokens are usually escalated
  [ThemeErrorCode.COVERAGE_GAP]: FindingSeverity.WARNING,
};

/** Short descriptions for each error code */
export const CODE_TO_MESSAGE: Record<ThemeErrorCode, string> = {
  [ThemeErrorCode.PARSE_ERROR]: "Malformed color literal",
  [ThemeErrorCode.SOURCE_INVALID]: "Source document does not match its schema",
  [ThemeErrorCode.UNRESOLVED_ROLE]: "Template references a role absent from the palette",
  [ThemeErrorCode.CONTRAST_UNATTAINABLE]: "Variant contrast floor cannot be met",
  [ThemeErrorCode.DRIFT_DETECTED]: "Generated theme does not match its source",
  [ThemeErrorCode.STRUCTURAL_VALIDATION]: "Theme structure is incomplete",
  [ThemeErrorCode.CONTRAST_VALIDATION]: "Contrast below the required minimum",
  [ThemeErrorCode.COVERAGE_GAP]: "Token coverage mismatch",
};

/**
 * Base class for fatal theme errors.
 */
export class ThemeError extends Error {
  readonly code: ThemeErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ThemeErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Malformed color literal (wrong length, missing '#', non-hex characters) */
export class ParseError extends ThemeError {
  readonly input: string;

  constructor(input: string, reason: string, role?: string) {
    const where = role ? ` for role '${role}'` : "";
    super(ThemeErrorCode.PARSE_ERROR, `Invalid color '${input}'${where}: ${reason}`, {
      input,
      reason,
      role,
    });
    this.input = input;
  }
}

/** Palette or template source document failed schema validation */
export class SourceError extends ThemeError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(ThemeErrorCode.SOURCE_INVALID, `${source}: ${issues.join("; ")}`, { source, issues });
    this.source = source;
    this.issues = issues;
  }
}

/**
 * A template placeholder or declared role has no color in the resolved palette.
 * Always a source inconsistency, never a condition to recover from.
 */
export class UnresolvedRoleError extends ThemeError {
  readonly role: string;
  readonly variant: string;

  constructor(role: string, variant: string, context?: string) {
    const where = context ? ` (at ${context})` : "";
    super(
      ThemeErrorCode.UNRESOLVED_ROLE,
      `Role '${role}' is not defined for variant '${variant}'${where}`,
      { role, variant, context }
    );
    this.role = role;
    this.variant = variant;
  }
}

/** Derivation could not reach the variant's contrast floor within the step bound */
export class ContrastUnattainableError extends ThemeError {
  readonly role: string;
  readonly variant: string;
  readonly bestRatio: number;
  readonly minimumRatio: number;

  constructor(role: string, variant: string, bestRatio: number, minimumRatio: number) {
    const shortfall = minimumRatio - bestRatio;
    super(
      ThemeErrorCode.CONTRAST_UNATTAINABLE,
      `Variant '${variant}': role '${role}' reaches ${bestRatio.toFixed(2)}:1, ` +
        `${shortfall.toFixed(2)} short of ${minimumRatio.toFixed(1)}:1`,
      { role, variant, bestRatio, minimumRatio, shortfall }
    );
    this.role = role;
    this.variant = variant;
    this.bestRatio = bestRatio;
    this.minimumRatio = minimumRatio;
  }

  get shortfall(): number {
    return this.minimumRatio - this.bestRatio;
  }
}

/** Committed artifact differs from a fresh generation */
export class DriftDetectedError extends ThemeError {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(
      ThemeErrorCode.DRIFT_DETECTED,
      `${CODE_TO_MESSAGE[ThemeErrorCode.DRIFT_DETECTED]} (${paths.length} difference${
        paths.length === 1 ? "" : "s"
      })`,
      { paths }
    );
    this.paths = paths;
  }
}

export function isThemeError(value: unknown): value is ThemeError {
  return value instanceof ThemeError;
}

/**
 * Build a finding with the code's default severity unless one is given.
 */
export function createFinding(
  code: ThemeErrorCode,
  category: FindingCategory,
  subject: string,
  message: string,
  options: { severity?: FindingSeverity; variant?: string } = {}
): Finding {
  const finding: Finding = {
    severity: options.severity ?? CODE_TO_SEVERITY[code],
    category,
    code,
    message,
    subject,
  };
  if (options.variant !== undefined) {
    finding.variant = options.variant;
  }
  return finding;
}
