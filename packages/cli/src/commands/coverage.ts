import { parseSource } from "@synthwave84/theme-core";
import { z } from "zod";

import { readJson } from "../files";
import { loadPipeline, type Command } from "./context";

export const ReferenceTokensSchema = z.object({
  $comment: z.string().optional(),
  tokens: z.array(z.string().min(1)).min(1),
});

/**
 * Compare the template's mapped tokens with the editor's highlighter tokens.
 */
export const coverageCommand: Command = ({ config, io }) => {
  const reference = parseSource(ReferenceTokensSchema, readJson(config.tokensPath), config.tokensPath);
  const report = loadPipeline(config).coverage(reference.tokens);

  io.out("Token Coverage");
  io.out("=".repeat(40));
  io.out(`Mapped tokens:  ${report.mapped}`);
  io.out(`Core tokens:    ${report.covered}/${report.total} covered`);

  if (report.missing.length > 0) {
    io.out("");
    io.out("Missing core tokens:");
    for (const token of report.missing) {
      io.out(`  - ${token}`);
    }
  } else {
    io.out("");
    io.out("All core tokens covered!");
  }

  io.out("");
  io.out(`Language-specific: ${report.extra.length} extra tokens`);
  return report.passed ? 0 : 1;
};
