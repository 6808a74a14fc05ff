// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Raster } from "../raster/raster.js";
import type { DiagnosticSink } from "../logger.js";
import type { OverlayResult, QRMatrix } from "./types.js";

/** Default coverage above which a scanability warning is logged. */
export const DEFAULT_COVERAGE_WARNING_PERCENT = 25;

/** Emblem diameter for a QR raster of the given height. */
export function emblemDiameter(qrHeight: number, emblemRatio: number): number {
  return Math.floor(qrHeight * emblemRatio);
}

/**
 * Percentage of the data area (quiet zone excluded, in module units)
 * obscured by the emblem's bounding square.
 */
export function coveragePercent(ballSize: number, modulePixelSize: number, moduleCount: number): number {
  const side = ballSize / modulePixelSize;
  return ((side * side) / (moduleCount * moduleCount)) * 100;
}

/**
 * Composite the emblem at the center of the QR raster and report how much
 * of the data area it hides. Coverage above the threshold only logs a
 * warning; the overlay is always applied.
 */
export function overlayEmblem(
  matrix: QRMatrix,
  emblem: Raster,
  logger: DiagnosticSink,
  warningPercent: number = DEFAULT_COVERAGE_WARNING_PERCENT,
): OverlayResult {
  const { raster } = matrix;
  const x = Math.floor((raster.width - emblem.width) / 2);
  const y = Math.floor((raster.height - emblem.height) / 2);

  const coverage = coveragePercent(emblem.width, matrix.modulePixelSize, matrix.moduleCount);
  const exceeded = coverage > warningPercent;
  logger.info(`Emblem covers ~${coverage.toFixed(1)}% of the QR data area.`);
  if (exceeded) {
    logger.warn(
      `Coverage exceeds ${warningPercent}%. The QR code may be difficult to scan; consider a smaller emblem ratio.`,
    );
  }

  raster.composite(emblem, x, y);
  return { raster, position: { x, y }, coveragePercent: coverage, coverageExceeded: exceeded };
}
