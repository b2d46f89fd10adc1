import { describe, expect, it } from "vitest";

import { compareCoverage, reportCoverage } from "../src/core/CoverageReporter";
import { ThemeTemplate } from "../src/core/TemplateRenderer";
import { FindingSeverity, ThemeErrorCode } from "../src/types";
import { templateSource } from "./fixtures";

describe("CoverageReporter", () => {
  it("reports full coverage", () => {
    const report = compareCoverage(["keyword", "string"], ["string", "keyword"]);
    expect(report).toEqual({
      findings: [],
      passed: true,
      missing: [],
      extra: [],
      covered: 2,
      total: 2,
      mapped: 2,
    });
  });

  it("missing tokens are errors and extras are warnings by default", () => {
    const report = compareCoverage(["type", "keyword", "comment"], ["keyword", "string.regex"]);
    expect(report.missing).toEqual(["comment", "type"]);
    expect(report.extra).toEqual(["string.regex"]);
    expect(report.covered).toBe(1);
    expect(report.total).toBe(3);
    expect(report.passed).toBe(false);
    expect(report.findings.map((f) => [f.severity, f.subject, f.message])).toEqual([
      [FindingSeverity.ERROR, "comment", "Token 'comment' has no mapping"],
      [FindingSeverity.ERROR, "type", "Token 'type' has no mapping"],
      [FindingSeverity.WARNING, "string.regex", "Token 'string.regex' is not in the reference list"],
    ]);
    expect(report.findings.every((f) => f.code === ThemeErrorCode.COVERAGE_GAP)).toBe(true);
  });

  it("policy can downgrade missing tokens", () => {
    const report = compareCoverage(["type"], [], { missingSeverity: FindingSeverity.WARNING });
    expect(report.passed).toBe(true);
    expect(report.findings[0].severity).toBe(FindingSeverity.WARNING);
  });

  it("ignores duplicates", () => {
    const report = compareCoverage(["keyword", "keyword"], ["keyword", "keyword"]);
    expect([report.covered, report.total, report.mapped]).toEqual([1, 1, 1]);
  });

  it("reads mapped tokens from the template", () => {
    const template = ThemeTemplate.load(templateSource());
    const report = reportCoverage(template, ["comment", "keyword", "string", "type"]);
    expect(report.missing).toEqual(["type"]);
    expect(report.extra).toEqual(["comment.doc"]);
    expect(report.mapped).toBe(4);
  });
});
