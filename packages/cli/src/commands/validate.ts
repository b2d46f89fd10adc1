import { FindingSeverity, type FindingCategory } from "@synthwave84/theme-core";

import { readJson } from "../files";
import { formatFinding, ok } from "../output";
import { loadPipeline, type Command } from "./context";

const CATEGORY_SUMMARY: Record<Exclude<FindingCategory, "coverage">, string> = {
  structural: "Valid structure",
  contrast: "All contrast pairings meet their minimum",
};

/**
 * Check the generated theme's structure and accessibility. Prints every
 * finding, not just the first.
 */
export const validateCommand: Command = ({ config, io }) => {
  io.out("Validating theme...");
  io.out("");

  const pipeline = loadPipeline(config);
  const report = pipeline.validate(readJson(config.outputPath));

  for (const category of ["structural", "contrast"] as const) {
    const findings = report.findings.filter((f) => f.category === category);
    findings.forEach((f) => io.out(formatFinding(f)));
    if (!findings.some((f) => f.severity === FindingSeverity.ERROR)) {
      io.out(ok(CATEGORY_SUMMARY[category]));
    }
  }

  io.out("");
  io.out(report.passed ? "Validation complete." : "Validation failed.");
  return report.passed ? 0 : 1;
};
