// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { readFileSync } from "node:fs";
import { PNG } from "pngjs";
import { Raster } from "./raster.js";
import { DecodeError, ResourceNotFoundError, errorCode, errorMessage } from "../errors.js";
import type { ResourceKind } from "../errors.js";
import { ok, err } from "../result.js";
import type { Result } from "../result.js";

/**
 * Decode PNG bytes into an RGBA raster. Palette, grayscale and 16-bit
 * images are converted to 8-bit RGBA by pngjs.
 *
 * @throws Error when the bytes are not a valid PNG
 */
export function decodePng(bytes: Buffer): Raster {
  const png = PNG.sync.read(bytes);
  return new Raster(png.width, png.height, new Uint8ClampedArray(png.data));
}

/** Encode a raster as an RGBA PNG. */
export function encodePng(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  png.data.set(raster.data);
  return PNG.sync.write(png, { colorType: 6 });
}

/**
 * Read a PNG file from disk.
 *
 * A missing file yields `ResourceNotFoundError`; anything that exists but
 * cannot be decoded yields `DecodeError`.
 */
export function readPngFile(
  path: string,
  resource: ResourceKind = "image",
): Result<Raster, ResourceNotFoundError | DecodeError> {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      return err(new ResourceNotFoundError(resource, path));
    }
    return err(new DecodeError(path, errorMessage(e)));
  }

  try {
    return ok(decodePng(bytes));
  } catch (e) {
    return err(new DecodeError(path, errorMessage(e)));
  }
}
