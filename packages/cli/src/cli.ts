/**
 * Command dispatch for the theme tool.
 *
 * Exit codes: 0 success, 1 check failed, 2 usage error.
 */

import { parseArgs } from "node:util";

import { isThemeError } from "@synthwave84/theme-core";

import { resolveConfig } from "./config";
import { checkCommand } from "./commands/check";
import type { Command } from "./commands/context";
import { coverageCommand } from "./commands/coverage";
import { deriveCommand } from "./commands/derive";
import { generateCommand } from "./commands/generate";
import { validateCommand } from "./commands/validate";
import { consoleIO, fail, type CommandIO } from "./output";

export type ExitCode = 0 | 1 | 2;

export const COMMANDS: Record<string, Command> = {
  generate: generateCommand,
  validate: validateCommand,
  check: checkCommand,
  derive: deriveCommand,
  coverage: coverageCommand,
};

export const USAGE = `Usage: synthwave84-theme <command> [options]

Commands:
  generate    Build themes/synthwave84.json from the palette and template
  validate    Check structure and contrast of the generated theme
  check       Fail if the generated theme differs from a fresh build
  derive      Compare derived colors with manual overrides
  coverage    Compare mapped syntax tokens with the editor's token list

Options:
  --root <dir>        Project root (default: working directory)
  --palette <file>    Palette source
  --template <file>   Template source
  --tokens <file>     Reference token list
  --output <file>     Generated theme
  --apply             derive: write derived colors into the palette
  --warn-missing      coverage: report unmapped tokens as warnings
  --debug             Log pipeline steps`;

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      root: { type: "string" },
      palette: { type: "string" },
      template: { type: "string" },
      tokens: { type: "string" },
      output: { type: "string" },
      apply: { type: "boolean" },
      "warn-missing": { type: "boolean" },
      debug: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export function main(argv: string[], io: CommandIO = consoleIO, cwd: string = process.cwd()): ExitCode {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const [name, ...rest] = positionals;
  const command = name !== undefined && Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (command === undefined || rest.length > 0) {
    io.err(name === undefined ? "Missing command" : `Unknown arguments: ${positionals.join(" ")}`);
    io.err(USAGE);
    return 2;
  }

  const config = resolveConfig(
    {
      root: values.root,
      palette: values.palette,
      template: values.template,
      tokens: values.tokens,
      output: values.output,
      apply: values.apply,
      warnMissing: values["warn-missing"],
      debug: values.debug,
    },
    cwd
  );

  try {
    return command({ config, io });
  } catch (err) {
    if (isThemeError(err)) {
      io.err(fail(err.message));
      return 1;
    }
    throw err;
  }
}
