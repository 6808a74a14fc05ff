// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Raster, Rgba } from "../raster/raster.js";
import type { EncodingError } from "../errors.js";
import type { Result } from "../result.js";

export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

/**
 * What to encode and how large each module is. Build with
 * `createQRSpecification()`; the record is frozen.
 */
export interface QRSpecification {
  readonly data: string;
  readonly errorCorrectionLevel: ErrorCorrectionLevel;
  /** Pixels per module (positive integer) */
  readonly modulePixelSize: number;
  /** Quiet-zone width in modules (non-negative integer) */
  readonly borderModules: number;
}

/**
 * An encoded QR symbol and its raster.
 *
 * `raster.width === raster.height ===
 *   (moduleCount + 2 * borderModules) * modulePixelSize`
 */
export interface QRMatrix {
  /** Symbol version, 1-40 */
  readonly version: number;
  /** Modules per side: 4 * version + 17 */
  readonly moduleCount: number;
  readonly modulePixelSize: number;
  readonly borderModules: number;
  /** Row-major dark-module flags, `moduleCount²` entries */
  readonly modules: Uint8Array;
  readonly raster: Raster;
}

/** Colors the encoder paints modules with. */
export interface MatrixColors {
  dark: Rgba;
  light: Rgba;
}

/**
 * QR-encoding capability. The pipeline only depends on this interface;
 * `QrcodeEncoder` is the default implementation.
 */
export interface Encoder {
  encode(spec: QRSpecification): Result<QRMatrix, EncodingError>;
}

/**
 * QR-decoding capability used by the optional validation step.
 */
export interface Decoder {
  /** Decoded payload, or null when no QR symbol was found. */
  decode(image: Raster): string | null;
}

export type FinderPosition = "top-left" | "top-right" | "bottom-left";

/** One finder marker: three concentric squares of 7, 5 and 3 modules. */
export interface FinderPatternSpec {
  readonly position: FinderPosition;
  readonly outerSideModules: 7;
  readonly innerSideModules: 5;
  readonly centerSideModules: 3;
  readonly outerColor: Rgba;
  readonly innerColor: Rgba;
  readonly centerColor: Rgba;
}

/**
 * Soccer-ball emblem geometry. Factors are fractions of the ball radius.
 */
export interface EmblemGeometry {
  readonly ballDiameterPx: number;
  readonly pentagonRadiusFactor: number;
  readonly hexagonRadiusFactor: number;
  readonly hexagonDistanceFactor: number;
  readonly rotationOffsetDegrees: number;
  readonly fillColor: Rgba;
  readonly lineColor: Rgba;
}

/** Result of placing the emblem on the QR raster. */
export interface OverlayResult {
  readonly raster: Raster;
  /** Top-left corner of the emblem on the QR raster */
  readonly position: { x: number; y: number };
  readonly coveragePercent: number;
  readonly coverageExceeded: boolean;
}

export type ValidationOutcome = "matched" | "mismatch" | "skipped";

/**
 * Summary of a successful generation run.
 */
export interface GenerationReport {
  readonly outputPath: string;
  readonly data: string;
  readonly version: number;
  readonly moduleCount: number;
  /** QR raster size before the outer border */
  readonly qrWidth: number;
  readonly qrHeight: number;
  /** Final image size */
  readonly width: number;
  readonly height: number;
  readonly emblemDiameter: number;
  readonly logoWidth: number;
  readonly logoHeight: number;
  readonly coveragePercent: number;
  readonly coverageExceeded: boolean;
  readonly validation: ValidationOutcome;
}
