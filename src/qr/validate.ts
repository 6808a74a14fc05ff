// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import jsQR from "jsqr";
import type { Raster } from "../raster/raster.js";
import { readPngFile } from "../raster/png.js";
import { ValidationMismatchError } from "../errors.js";
import type { DecodeError, ResourceNotFoundError } from "../errors.js";
import { ok, err } from "../result.js";
import type { Result } from "../result.js";
import type { DiagnosticSink } from "../logger.js";
import type { Decoder } from "./types.js";

/** Decoder backed by `jsqr`. */
export class JsqrDecoder implements Decoder {
  decode(image: Raster): string | null {
    const result = jsQR(image.data, image.width, image.height);
    return result ? result.data : null;
  }
}

/**
 * Read a saved image back and check that it decodes to `expected`.
 *
 * Returns the decoded payload on a match. A mismatch or an unreadable
 * symbol is advisory: callers report it but keep the image.
 */
export function validateOutput(
  imagePath: string,
  expected: string,
  decoder: Decoder,
  logger: DiagnosticSink,
): Result<string, ValidationMismatchError | ResourceNotFoundError | DecodeError> {
  logger.info(`Running validation on ${imagePath}`);

  const image = readPngFile(imagePath, "image");
  if (!image.ok) {
    logger.error(`Validation could not read the image: ${image.error.message}`);
    return image;
  }

  const found = decoder.decode(image.value);
  if (found === null) {
    logger.error("VALIDATION FAILED: No QR code found in the generated image.");
    return err(new ValidationMismatchError(expected, null));
  }
  if (found !== expected) {
    logger.error("VALIDATION FAILED: Found a QR code, but data does not match.");
    logger.error(`  Expected: ${expected}`);
    logger.error(`  Found:    ${found}`);
    return err(new ValidationMismatchError(expected, found));
  }

  logger.info(`VALIDATION SUCCESS: Found QR code with matching data: ${found}`);
  return ok(found);
}
