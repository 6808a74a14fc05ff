// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { ConfigError } from "./errors.js";
import { DEFAULT_COVERAGE_WARNING_PERCENT } from "./qr/overlay.js";
import { parseColor } from "./raster/raster.js";
import type { Rgba } from "./raster/raster.js";

/** Colors as `#rrggbb` (or `#rrggbbaa`) strings. */
export interface ColorScheme {
  /** Dark QR modules */
  module: string;
  /** Finder pattern rings */
  accent: string;
  /** Light modules, borders and the emblem's fill */
  background: string;
  /** Emblem outlines */
  pattern: string;
}

/**
 * Everything a generation run needs. Build with {@link defineConfig};
 * the returned record is frozen.
 */
export interface EmblemQrConfig {
  /** Data (usually a URL) to encode */
  readonly data: string;
  /** PNG logo placed in the middle of the emblem */
  readonly logoPath: string;
  /** Where the final PNG is written */
  readonly outputPath: string;
  /** Pixels per QR module */
  readonly modulePixelSize: number;
  /** Quiet-zone width in modules */
  readonly borderModules: number;
  /** Extra pixels added around the whole image (split evenly between sides) */
  readonly outerBorderPx: number;
  /** Emblem diameter relative to the QR raster height */
  readonly emblemRatio: number;
  /** Logo's longer side relative to the emblem diameter */
  readonly logoRatio: number;
  /** Logo contrast factor; 1 disables the enhancement */
  readonly logoContrast: number;
  readonly pentagonRadiusFactor: number;
  readonly hexagonRadiusFactor: number;
  readonly hexagonDistanceFactor: number;
  /** Angle of the pentagon's first vertex (-90 points it up) */
  readonly rotationOffsetDegrees: number;
  /** Coverage above this percentage logs a warning */
  readonly coverageWarningPercent: number;
  readonly colors: Readonly<ColorScheme>;
  /** Create the output directory when it does not exist */
  readonly createOutputDirectory: boolean;
  /** Decode the saved image and compare it with `data` */
  readonly validate: boolean;
}

/** Overrides accepted by {@link defineConfig}. */
export type EmblemQrConfigInput = Partial<Omit<EmblemQrConfig, "colors">> & {
  colors?: Partial<ColorScheme>;
};

/** Parsed colors, ready for drawing. */
export interface Palette {
  module: Rgba;
  accent: Rgba;
  background: Rgba;
  pattern: Rgba;
}

export const DEFAULT_CONFIG: EmblemQrConfig = Object.freeze({
  data: "https://example.org",
  logoPath: "logo_square.png",
  outputPath: "emblem_qr.png",
  modulePixelSize: 35,
  borderModules: 6,
  outerBorderPx: 20,
  emblemRatio: 0.25,
  logoRatio: 0.7,
  logoContrast: 1.1,
  pentagonRadiusFactor: 0.18,
  hexagonRadiusFactor: 0.16,
  hexagonDistanceFactor: 0.3,
  rotationOffsetDegrees: -90,
  coverageWarningPercent: DEFAULT_COVERAGE_WARNING_PERCENT,
  colors: Object.freeze({
    module: "#000066",
    accent: "#c8102e",
    background: "#ffffff",
    pattern: "#a0a0a0",
  }),
  createOutputDirectory: false,
  validate: false,
});

/**
 * Merge overrides onto {@link DEFAULT_CONFIG} and validate the result.
 *
 * @example
 * ```ts
 * const config = defineConfig({
 *   data: "https://club.example.org",
 *   logoPath: "./assets/crest.png",
 *   outputPath: "./out/club-qr.png",
 * });
 * ```
 *
 * @throws ConfigError listing every invalid field
 */
export function defineConfig(overrides: EmblemQrConfigInput = {}): EmblemQrConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const colors: ColorScheme = { ...DEFAULT_CONFIG.colors };
  for (const [key, value] of Object.entries(overrides.colors ?? {})) {
    if (value !== undefined && isColorKey(key)) colors[key] = value;
  }

  const config: EmblemQrConfig = { ...DEFAULT_CONFIG, ...defined, colors };
  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return Object.freeze({ ...config, colors: Object.freeze(colors) });
}

/**
 * Check every field. Returns an empty array when the configuration is valid.
 */
export function validateConfig(config: EmblemQrConfig): string[] {
  const issues: string[] = [];

  if (typeof config.data !== "string" || config.data.length === 0) {
    issues.push("data must be a non-empty string");
  }
  if (!config.logoPath) issues.push("logoPath is required");
  if (!config.outputPath) issues.push("outputPath is required");

  if (!isPositiveInteger(config.modulePixelSize)) {
    issues.push(`modulePixelSize must be a positive integer (got ${config.modulePixelSize})`);
  }
  if (!isNonNegativeInteger(config.borderModules)) {
    issues.push(`borderModules must be a non-negative integer (got ${config.borderModules})`);
  }
  if (!isNonNegativeInteger(config.outerBorderPx)) {
    issues.push(`outerBorderPx must be a non-negative integer (got ${config.outerBorderPx})`);
  }

  const unitFields = [
    "emblemRatio",
    "logoRatio",
    "pentagonRadiusFactor",
    "hexagonRadiusFactor",
    "hexagonDistanceFactor",
  ] as const;
  for (const field of unitFields) {
    const value = config[field];
    if (!Number.isFinite(value) || value <= 0 || value >= 1) {
      issues.push(`${field} must be between 0 and 1 exclusive (got ${value})`);
    }
  }

  if (!Number.isFinite(config.logoContrast) || config.logoContrast <= 0) {
    issues.push(`logoContrast must be a positive number (got ${config.logoContrast})`);
  }
  if (!Number.isFinite(config.rotationOffsetDegrees)) {
    issues.push("rotationOffsetDegrees must be a finite number");
  }
  if (
    !Number.isFinite(config.coverageWarningPercent) ||
    config.coverageWarningPercent < 0 ||
    config.coverageWarningPercent > 100
  ) {
    issues.push(`coverageWarningPercent must be between 0 and 100 (got ${config.coverageWarningPercent})`);
  }

  for (const [key, value] of Object.entries(config.colors)) {
    if (typeof value !== "string" || !parseColor(value)) {
      issues.push(`colors.${key} must be a #rrggbb or #rrggbbaa color (got ${String(value)})`);
    }
  }

  return issues;
}

/**
 * Parse the configured colors. Only call on a config returned by
 * {@link defineConfig}, whose colors are already validated.
 */
export function resolvePalette(colors: Readonly<ColorScheme>): Palette {
  const parse = (name: keyof ColorScheme): Rgba => {
    const color = parseColor(colors[name]);
    if (!color) throw new ConfigError(`Invalid color for ${name}: ${colors[name]}`, [name]);
    return color;
  };
  return {
    module: parse("module"),
    accent: parse("accent"),
    background: parse("background"),
    pattern: parse("pattern"),
  };
}

function isColorKey(key: string): key is keyof ColorScheme {
  return key === "module" || key === "accent" || key === "background" || key === "pattern";
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
