import { FindingSeverity, ThemePipeline } from "@synthwave84/theme-core";

import type { ThemeProjectConfig } from "../config";
import { readJson } from "../files";
import type { CommandIO } from "../output";

export interface CommandContext {
  config: ThemeProjectConfig;
  io: CommandIO;
}

/** Exit code of a command */
export type CommandResult = 0 | 1;

export type Command = (ctx: CommandContext) => CommandResult;

export function loadPipeline(config: ThemeProjectConfig): ThemePipeline {
  return ThemePipeline.fromSources(readJson(config.palettePath), readJson(config.templatePath), {
    debug: config.debug,
    coverage: config.warnMissing ? { missingSeverity: FindingSeverity.WARNING } : {},
  });
}
