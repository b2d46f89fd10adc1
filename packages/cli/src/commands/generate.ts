import { displayPath } from "../config";
import { readTextIfExists, writeFileAtomic } from "../files";
import { loadPipeline, type Command } from "./context";

/**
 * Build the theme from source. Everything is rendered before the single
 * atomic write; unchanged output leaves the file untouched.
 */
export const generateCommand: Command = ({ config, io }) => {
  const text = loadPipeline(config).serialize();
  const target = displayPath(config, config.outputPath);

  if (readTextIfExists(config.outputPath) === text) {
    io.out(`Up to date ${target}`);
    return 0;
  }

  writeFileAtomic(config.outputPath, text);
  io.out(`Generated ${target}`);
  return 0;
};
