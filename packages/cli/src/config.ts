/**
 * Project layout and command options.
 */

import * as path from "node:path";

/** Source and artifact locations, relative to the project root */
export const DEFAULT_PROJECT_LAYOUT = {
  palette: "theme/palette.json",
  template: "theme/template.json",
  tokens: "theme/zed-tokens.json",
  output: "themes/synthwave84.json",
} as const;

export interface ThemeProjectConfig {
  root: string;
  palettePath: string;
  templatePath: string;
  tokensPath: string;
  outputPath: string;
  /** Enable debug logging in the core pipeline */
  debug: boolean;
  /** Write derived colors back into the palette (derive) */
  apply: boolean;
  /** Report unmapped reference tokens as warnings instead of errors (coverage) */
  warnMissing: boolean;
}

export interface ThemeProjectOptions {
  root?: string;
  palette?: string;
  template?: string;
  tokens?: string;
  output?: string;
  debug?: boolean;
  apply?: boolean;
  warnMissing?: boolean;
}

/**
 * Resolve every path against the root (default: the working directory).
 */
export function resolveConfig(options: ThemeProjectOptions = {}, cwd: string = process.cwd()): ThemeProjectConfig {
  const root = path.resolve(cwd, options.root ?? ".");
  const at = (file: string) => path.resolve(root, file);

  return {
    root,
    palettePath: at(options.palette ?? DEFAULT_PROJECT_LAYOUT.palette),
    templatePath: at(options.template ?? DEFAULT_PROJECT_LAYOUT.template),
    tokensPath: at(options.tokens ?? DEFAULT_PROJECT_LAYOUT.tokens),
    outputPath: at(options.output ?? DEFAULT_PROJECT_LAYOUT.output),
    debug: options.debug ?? false,
    apply: options.apply ?? false,
    warnMissing: options.warnMissing ?? false,
  };
}

/** Path relative to the root, for messages */
export function displayPath(config: ThemeProjectConfig, file: string): string {
  return path.relative(config.root, file) || file;
}
