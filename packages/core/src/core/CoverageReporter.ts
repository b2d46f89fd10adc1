/**
 * CoverageReporter - mapped template tokens vs the editor's highlighter tokens.
 *
 * Reference tokens with no mapping are reported at the policy severity
 * (error by default). Mapped tokens the reference list does not know are
 * warnings: the editor may simply be newer than the list.
 */

import { createFinding } from "./ThemeErrors";
import type { ThemeTemplate } from "./TemplateRenderer";
import { FindingSeverity, ThemeErrorCode, buildReport, type Finding, type ValidationReport } from "../types";

export interface CoveragePolicy {
  /** Severity for reference tokens with no mapping */
  missingSeverity?: FindingSeverity;
}

export interface CoverageReport extends ValidationReport {
  /** Reference tokens with no mapping, sorted */
  missing: string[];
  /** Mapped tokens outside the reference list, sorted */
  extra: string[];
  covered: number;
  total: number;
  /** Distinct mapped tokens */
  mapped: number;
}

/**
 * Compare two token sets. Duplicates in either input are ignored.
 */
export function compareCoverage(
  referenceTokens: Iterable<string>,
  mappedTokens: Iterable<string>,
  policy: CoveragePolicy = {}
): CoverageReport {
  const reference = new Set(referenceTokens);
  const mapped = new Set(mappedTokens);
  const missing = [...reference].filter((t) => !mapped.has(t)).sort();
  const extra = [...mapped].filter((t) => !reference.has(t)).sort();
  const missingSeverity = policy.missingSeverity ?? FindingSeverity.ERROR;

  const findings: Finding[] = [
    ...missing.map((token) =>
      createFinding(ThemeErrorCode.COVERAGE_GAP, "coverage", token, `Token '${token}' has no mapping`, {
        severity: missingSeverity,
      })
    ),
    ...extra.map((token) =>
      createFinding(
        ThemeErrorCode.COVERAGE_GAP,
        "coverage",
        token,
        `Token '${token}' is not in the reference list`,
        { severity: FindingSeverity.WARNING }
      )
    ),
  ];

  return {
    ...buildReport(findings),
    missing,
    extra,
    covered: reference.size - missing.length,
    total: reference.size,
    mapped: mapped.size,
  };
}

export function reportCoverage(
  template: ThemeTemplate,
  referenceTokens: Iterable<string>,
  policy: CoveragePolicy = {}
): CoverageReport {
  return compareCoverage(referenceTokens, template.tokens(), policy);
}
