// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { EmblemQrConfig } from "../config.js";
import { resolvePalette } from "../config.js";
import type { DecodeError, EncodingError, IOWriteError, ResourceNotFoundError } from "../errors.js";
import type { DiagnosticSink } from "../logger.js";
import { readPngFile } from "../raster/png.js";
import { ok } from "../result.js";
import type { Result } from "../result.js";
import { addOuterBorder, saveImage } from "./assembler.js";
import { generateEmblem } from "./emblem.js";
import { QrcodeEncoder, createQRSpecification } from "./encoder.js";
import { finderPatternSpecs, paintFinderPatterns } from "./finder.js";
import { compositeLogo } from "./logo.js";
import { emblemDiameter, overlayEmblem } from "./overlay.js";
import type { Decoder, EmblemGeometry, Encoder, GenerationReport, ValidationOutcome } from "./types.js";
import { JsqrDecoder, validateOutput } from "./validate.js";

/** Failures that abort a generation run. */
export type PipelineError = ResourceNotFoundError | DecodeError | EncodingError | IOWriteError;

export interface GenerateDependencies {
  /** Diagnostics for this run */
  logger: DiagnosticSink;
  /** QR encoder (default: `QrcodeEncoder` with the configured colors) */
  encoder?: Encoder;
  /** Decoder for `validate: true` runs (default: `JsqrDecoder`) */
  decoder?: Decoder;
}

/**
 * Generate an emblem QR code and save it to `config.outputPath`.
 *
 * Stages run in order: load logo, encode at level H, repaint finders,
 * draw the emblem, composite the logo, overlay the emblem, add the outer
 * border and save. The first failure is logged and returned; nothing is
 * written after it. When `config.validate` is set the saved image is
 * decoded again; a mismatch is reported in the result but does not fail
 * the run.
 *
 * @example
 * ```ts
 * const result = generateEmblemQr(
 *   defineConfig({ data: "https://club.example.org", logoPath: "crest.png" }),
 *   { logger: createConsoleSink() },
 * );
 * if (result.ok) console.log(result.value.coveragePercent);
 * ```
 */
export function generateEmblemQr(
  config: EmblemQrConfig,
  deps: GenerateDependencies,
): Result<GenerationReport, PipelineError> {
  const { logger } = deps;
  const palette = resolvePalette(config.colors);

  const logo = readPngFile(config.logoPath, "logo");
  if (!logo.ok) {
    logger.error(logo.error.message);
    return logo;
  }
  logger.info(`Logo loaded successfully: ${config.logoPath}`);

  const encoder = deps.encoder ?? new QrcodeEncoder({ dark: palette.module, light: palette.background });
  const encoded = encoder.encode(
    createQRSpecification(config.data, {
      modulePixelSize: config.modulePixelSize,
      borderModules: config.borderModules,
      errorCorrectionLevel: "H",
    }),
  );
  if (!encoded.ok) {
    logger.error(encoded.error.message);
    return encoded;
  }
  logger.info(`QR code created with version ${encoded.value.version} and high error correction.`);

  const matrix = paintFinderPatterns(
    encoded.value,
    finderPatternSpecs(palette.accent, palette.background),
    logger,
  );

  const qrWidth = matrix.raster.width;
  const qrHeight = matrix.raster.height;
  const diameter = Math.max(1, emblemDiameter(qrHeight, config.emblemRatio));
  const geometry: EmblemGeometry = {
    ballDiameterPx: diameter,
    pentagonRadiusFactor: config.pentagonRadiusFactor,
    hexagonRadiusFactor: config.hexagonRadiusFactor,
    hexagonDistanceFactor: config.hexagonDistanceFactor,
    rotationOffsetDegrees: config.rotationOffsetDegrees,
    fillColor: palette.background,
    lineColor: palette.pattern,
  };
  const emblem = generateEmblem(geometry, logger);

  const withLogo = compositeLogo(
    emblem,
    logo.value,
    { relativeSize: config.logoRatio, contrast: config.logoContrast },
    logger,
  );

  const overlay = overlayEmblem(matrix, withLogo.emblem, logger, config.coverageWarningPercent);
  const image = addOuterBorder(overlay.raster, config.outerBorderPx, palette.background);

  const saved = saveImage(image, config.outputPath, logger, {
    createDirectory: config.createOutputDirectory,
  });
  if (!saved.ok) {
    logger.error(saved.error.message);
    return saved;
  }

  let validation: ValidationOutcome = "skipped";
  if (config.validate) {
    const decoder = deps.decoder ?? new JsqrDecoder();
    const checked = validateOutput(saved.value, config.data, decoder, logger);
    validation = checked.ok ? "matched" : "mismatch";
    if (!checked.ok) {
      logger.error("Please check parameters. The QR code might be too obscured.");
    }
  }

  logger.info("QR code generation complete.");
  return ok({
    outputPath: saved.value,
    data: config.data,
    version: matrix.version,
    moduleCount: matrix.moduleCount,
    qrWidth,
    qrHeight,
    width: image.width,
    height: image.height,
    emblemDiameter: diameter,
    logoWidth: withLogo.logoWidth,
    logoHeight: withLogo.logoHeight,
    coveragePercent: overlay.coveragePercent,
    coverageExceeded: overlay.coverageExceeded,
    validation,
  });
}
