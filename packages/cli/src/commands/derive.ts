import { PaletteSourceSchema, applyDerivation, parseSource } from "@synthwave84/theme-core";

import { displayPath } from "../config";
import { readJson, toJsonText, writeFileAtomic } from "../files";
import { loadPipeline, type Command } from "./context";

const RULE = "=".repeat(78);

/**
 * Show derived vs manual colors per syntax role; `--apply` writes the derived
 * colors into the palette's variant overrides.
 */
export const deriveCommand: Command = ({ config, io }) => {
  const rows = loadPipeline(config).compareDerivation();

  io.out("Derived vs Manual Colors (WCAG contrast in parentheses)");
  io.out(RULE);
  io.out(
    `${"Role".padEnd(18)} ${"Variant".padEnd(14)} ${"Manual".padEnd(9)} ${"Derived".padEnd(9)} ${"Diff".padStart(
      5
    )} ${"Contrast".padStart(12)}`
  );
  io.out("-".repeat(78));

  for (const row of rows) {
    const contrast = `${row.manualRatio.toFixed(1)}/${row.derivedRatio.toFixed(1)}`;
    io.out(
      `${row.role.padEnd(18)} ${row.variant.padEnd(14)} ${row.manual.toHex().padEnd(9)} ${row.derived
        .toHex()
        .padEnd(9)} ${(row.matches ? "same" : "DIFF").padStart(5)} ${contrast.padStart(12)}`
    );
  }

  io.out("");
  if (!config.apply) {
    io.out("Use '--apply' to update the palette with derived colors");
    return 0;
  }

  const source = parseSource(PaletteSourceSchema, readJson(config.palettePath), config.palettePath);
  writeFileAtomic(config.palettePath, toJsonText(applyDerivation(source, { debug: config.debug })));
  io.out(`Updated ${displayPath(config, config.palettePath)}`);
  return 0;
};
