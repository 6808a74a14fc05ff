// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Raster } from "../raster/raster.js";
import { enhanceContrast, resize } from "../raster/resample.js";
import type { DiagnosticSink } from "../logger.js";

export interface LogoPlacement {
  /** Longer side of the logo as a fraction of the emblem diameter */
  relativeSize: number;
  /** Contrast factor applied after scaling; 1 (or omitted) skips it */
  contrast?: number;
}

/**
 * Size of the logo once its longer side is scaled to `target` pixels.
 * The shorter side keeps the aspect ratio and is at least 1 pixel.
 */
export function fitLogoSize(
  width: number,
  height: number,
  target: number,
): { width: number; height: number } {
  const scale = target / Math.max(width, height);
  return width >= height
    ? { width: target, height: Math.max(1, Math.round(height * scale)) }
    : { width: Math.max(1, Math.round(width * scale)), height: target };
}

/**
 * Scale the logo, optionally raise its contrast, and composite it at the
 * center of the emblem using the logo's own alpha as the mask.
 *
 * Returns the emblem (modified in place) and the logo's final size.
 */
export function compositeLogo(
  emblem: Raster,
  logo: Raster,
  placement: LogoPlacement,
  logger: DiagnosticSink,
): { emblem: Raster; logoWidth: number; logoHeight: number } {
  const target = Math.max(1, Math.floor(emblem.width * placement.relativeSize));
  const size = fitLogoSize(logo.width, logo.height, target);

  let scaled = resize(logo, size.width, size.height);
  const contrast = placement.contrast ?? 1;
  if (contrast !== 1) {
    scaled = enhanceContrast(scaled, contrast);
  }

  const x = Math.floor((emblem.width - scaled.width) / 2);
  const y = Math.floor((emblem.height - scaled.height) / 2);
  emblem.composite(scaled, x, y);

  logger.info(
    `Pasted ${logo.width}x${logo.height} logo onto emblem at ${scaled.width}x${scaled.height}px.`,
  );
  return { emblem, logoWidth: scaled.width, logoHeight: scaled.height };
}
