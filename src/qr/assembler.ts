// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { Raster } from "../raster/raster.js";
import type { Rgba } from "../raster/raster.js";
import { encodePng } from "../raster/png.js";
import { IOWriteError, ResourceNotFoundError, errorCode, errorMessage } from "../errors.js";
import { ok, err } from "../result.js";
import type { Result } from "../result.js";
import type { DiagnosticSink } from "../logger.js";

/**
 * Place the QR raster on a background canvas `outerBorder` pixels larger
 * on each axis, offset by half the border.
 */
export function addOuterBorder(qr: Raster, outerBorder: number, background: Rgba): Raster {
  const canvas = Raster.filled(qr.width + outerBorder, qr.height + outerBorder, background);
  const offset = Math.floor(outerBorder / 2);
  canvas.paste(qr, offset, offset);
  return canvas;
}

export interface SaveOptions {
  /** Create the parent directory when missing instead of failing */
  createDirectory?: boolean;
}

/**
 * Write the raster as a PNG.
 *
 * The file is written beside the target and renamed into place, so a
 * failed save never leaves a partial file and keeps any previous output.
 */
export function saveImage(
  image: Raster,
  outputPath: string,
  logger: DiagnosticSink,
  options: SaveOptions = {},
): Result<string, ResourceNotFoundError | IOWriteError> {
  const target = resolve(outputPath);
  const directory = dirname(target);

  if (!existsSync(directory)) {
    if (!options.createDirectory) {
      return err(new ResourceNotFoundError("output-directory", directory));
    }
    try {
      mkdirSync(directory, { recursive: true });
      logger.info(`Created output directory: ${directory}`);
    } catch (e) {
      return err(new IOWriteError(outputPath, errorMessage(e), errorCode(e)));
    }
  }

  const temp = join(directory, `.${basename(target)}.${process.pid}.tmp`);
  try {
    writeFileSync(temp, encodePng(image));
    renameSync(temp, target);
  } catch (e) {
    try {
      rmSync(temp, { force: true });
    } catch (cleanup) {
      logger.warn(`Could not remove temporary file ${temp}: ${errorMessage(cleanup)}`);
    }
    const code = errorCode(e);
    if (code === "ENOENT") {
      return err(new ResourceNotFoundError("output-directory", directory));
    }
    const reason = code === "EACCES" || code === "EPERM" ? "permission denied" : errorMessage(e);
    return err(new IOWriteError(outputPath, reason, code));
  }

  logger.info(`QR code saved successfully to: ${outputPath}`);
  return ok(target);
}
