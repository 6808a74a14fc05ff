// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import QRCode from "qrcode";
import type { QRCode as QRSymbol } from "qrcode";
import { Raster } from "../raster/raster.js";
import { ConfigError, EncodingError, errorMessage } from "../errors.js";
import { ok, err } from "../result.js";
import type { Result } from "../result.js";
import type {
  Encoder,
  ErrorCorrectionLevel,
  MatrixColors,
  QRMatrix,
  QRSpecification,
} from "./types.js";

/** Modules per side for a QR version. */
export function moduleCountForVersion(version: number): number {
  return 4 * version + 17;
}

/** Pixel side of a rendered symbol including its quiet zone. */
export function rasterSide(moduleCount: number, borderModules: number, modulePixelSize: number): number {
  return (moduleCount + 2 * borderModules) * modulePixelSize;
}

/**
 * Build a frozen {@link QRSpecification}. The error-correction level
 * defaults to H, which tolerates roughly 30% damage.
 *
 * @throws ConfigError when the module size or border is not a valid integer
 */
export function createQRSpecification(
  data: string,
  options: {
    modulePixelSize: number;
    borderModules: number;
    errorCorrectionLevel?: ErrorCorrectionLevel;
  },
): QRSpecification {
  const { modulePixelSize, borderModules } = options;
  if (!Number.isInteger(modulePixelSize) || modulePixelSize < 1) {
    throw new ConfigError(`modulePixelSize must be a positive integer (got ${modulePixelSize})`);
  }
  if (!Number.isInteger(borderModules) || borderModules < 0) {
    throw new ConfigError(`borderModules must be a non-negative integer (got ${borderModules})`);
  }
  return Object.freeze({
    data,
    errorCorrectionLevel: options.errorCorrectionLevel ?? "H",
    modulePixelSize,
    borderModules,
  });
}

/**
 * Encoder backed by the `qrcode` package.
 *
 * No version is forced, so `qrcode` picks the smallest version whose
 * capacity at the requested level fits the data. Dark modules are painted
 * as `modulePixelSize` squares on a canvas filled with the light color.
 */
export class QrcodeEncoder implements Encoder {
  private readonly _colors: MatrixColors;

  constructor(colors: MatrixColors) {
    this._colors = colors;
  }

  encode(spec: QRSpecification): Result<QRMatrix, EncodingError> {
    if (spec.data.length === 0) {
      return err(new EncodingError("Cannot encode empty data", 0));
    }

    let symbol: QRSymbol;
    try {
      symbol = QRCode.create(spec.data, { errorCorrectionLevel: spec.errorCorrectionLevel });
    } catch (e) {
      return err(
        new EncodingError(
          `Failed to encode ${spec.data.length} characters at level ${spec.errorCorrectionLevel}: ${errorMessage(e)}`,
          spec.data.length,
        ),
      );
    }

    const moduleCount = symbol.modules.size;
    const modules = new Uint8Array(moduleCount * moduleCount);
    for (let row = 0; row < moduleCount; row++) {
      for (let col = 0; col < moduleCount; col++) {
        modules[row * moduleCount + col] = symbol.modules.get(row, col) ? 1 : 0;
      }
    }

    const s = spec.modulePixelSize;
    const side = rasterSide(moduleCount, spec.borderModules, s);
    const raster = Raster.filled(side, side, this._colors.light);
    const origin = spec.borderModules * s;
    for (let row = 0; row < moduleCount; row++) {
      for (let col = 0; col < moduleCount; col++) {
        if (modules[row * moduleCount + col]) {
          raster.fillRect(origin + col * s, origin + row * s, s, s, this._colors.dark);
        }
      }
    }

    return ok({
      version: symbol.version,
      moduleCount,
      modulePixelSize: s,
      borderModules: spec.borderModules,
      modules,
      raster,
    });
  }
}
