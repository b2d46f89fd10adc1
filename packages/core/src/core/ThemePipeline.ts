/**
 * ThemePipeline - load -> derive -> render -> validate / check / report.
 *
 * Holds no mutable state: every call recomputes from the loaded sources, so
 * repeated calls with the same inputs give identical results.
 */

import { reportCoverage, type CoveragePolicy, type CoverageReport } from "./CoverageReporter";
import { checkDrift, type DriftEntry } from "./DriftChecker";
import { PaletteStore } from "./PaletteStore";
import { ThemeTemplate, renderTheme, serializeTheme } from "./TemplateRenderer";
import { validateTheme, type ValidationContext } from "./Validator";
import {
  VariantDeriver,
  type DerivationComparison,
  type ResolvedPalette,
  type VariantDeriverOptions,
} from "./VariantDeriver";
import type { ThemeFamilyDocument, ValidationReport } from "../types";

export interface ThemePipelineOptions extends VariantDeriverOptions {
  coverage?: CoveragePolicy;
}

export class ThemePipeline {
  readonly palette: PaletteStore;
  readonly template: ThemeTemplate;
  private readonly deriver: VariantDeriver;
  private readonly coveragePolicy: CoveragePolicy;
  private readonly debug: boolean;

  constructor(palette: PaletteStore, template: ThemeTemplate, options: ThemePipelineOptions = {}) {
    this.palette = palette;
    this.template = template;
    this.deriver = new VariantDeriver(palette, options);
    this.coveragePolicy = options.coverage ?? {};
    this.debug = options.debug ?? false;
  }

  /**
   * Build a pipeline from raw (parsed JSON) source documents.
   *
   * @throws SourceError / ParseError when a source is invalid
   */
  static fromSources(palette: unknown, template: unknown, options: ThemePipelineOptions = {}): ThemePipeline {
    return new ThemePipeline(PaletteStore.load(palette), ThemeTemplate.load(template), options);
  }

  get validationContext(): ValidationContext {
    return { template: this.template, variants: this.palette.variants };
  }

  /** Resolved palettes for every declared variant */
  derive(): ResolvedPalette[] {
    const palettes = this.deriver.deriveAll();
    this.log(`Derived ${palettes.length} variants: ${palettes.map((p) => p.variant).join(", ")}`);
    return palettes;
  }

  generate(): ThemeFamilyDocument {
    const document = renderTheme(this.template, this.derive());
    this.log(`Rendered ${document.themes.length} themes, ${this.template.tokens().length} tokens each`);
    return document;
  }

  /** The generated artifact's exact bytes */
  serialize(): string {
    return serializeTheme(this.generate());
  }

  validate(document: unknown): ValidationReport {
    const report = validateTheme(document, this.validationContext);
    this.log(`Validation: ${report.findings.length} findings, passed=${report.passed}`);
    return report;
  }

  /**
   * Diff a fresh generation against the committed artifact (`null` = absent).
   */
  check(committed: unknown): DriftEntry[] {
    const entries = checkDrift(this.generate(), committed);
    this.log(`Drift check: ${entries.length} differences`);
    return entries;
  }

  compareDerivation(): DerivationComparison[] {
    return this.deriver.compare();
  }

  coverage(referenceTokens: Iterable<string>): CoverageReport {
    return reportCoverage(this.template, referenceTokens, this.coveragePolicy);
  }

  private log(message: string): void {
    if (this.debug) {
      console.debug(`[ThemePipeline] ${message}`);
    }
  }
}
