import { describeDrift } from "@synthwave84/theme-core";

import { displayPath } from "../config";
import { readJsonIfExists } from "../files";
import { fail, ok } from "../output";
import { loadPipeline, type Command } from "./context";

/**
 * CI gate: regenerate in memory and diff against the committed artifact.
 */
export const checkCommand: Command = ({ config, io }) => {
  io.out("Checking theme matches source...");
  io.out("");

  const entries = loadPipeline(config).check(readJsonIfExists(config.outputPath));
  if (entries.length === 0) {
    io.out(ok("Theme matches source"));
    return 0;
  }

  for (const entry of entries) {
    io.out(fail(describeDrift(entry)));
  }
  io.out(`  ${entries.length} difference(s) in ${displayPath(config, config.outputPath)}`);
  io.out("  Run 'npm run theme:generate' to regenerate");
  return 1;
};
