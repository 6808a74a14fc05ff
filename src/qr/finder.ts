// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Rgba } from "../raster/raster.js";
import type { DiagnosticSink } from "../logger.js";
import type { FinderPatternSpec, FinderPosition, QRMatrix } from "./types.js";

export const FINDER_POSITIONS: readonly FinderPosition[] = ["top-left", "top-right", "bottom-left"];

/** Side of a finder pattern in modules. */
export const FINDER_MODULES = 7;

/**
 * Finder specs for all three corners: outer and center squares in the
 * accent color, the ring between them in the background color.
 */
export function finderPatternSpecs(accent: Rgba, background: Rgba): FinderPatternSpec[] {
  return FINDER_POSITIONS.map((position) => ({
    position,
    outerSideModules: 7,
    innerSideModules: 5,
    centerSideModules: 3,
    outerColor: accent,
    innerColor: background,
    centerColor: accent,
  }));
}

/**
 * Pixel offset of a finder's top-left corner on the QR raster.
 */
export function finderOrigin(matrix: QRMatrix, position: FinderPosition): { x: number; y: number } {
  const s = matrix.modulePixelSize;
  const near = matrix.borderModules * s;
  const far = near + (matrix.moduleCount - FINDER_MODULES) * s;
  switch (position) {
    case "top-left":
      return { x: near, y: near };
    case "top-right":
      return { x: far, y: near };
    case "bottom-left":
      return { x: near, y: far };
  }
}

/**
 * Overdraw the three finder patterns as concentric squares of 7, 5 and 3
 * modules. Only pixels inside the 7×7-module boxes change.
 */
export function paintFinderPatterns(
  matrix: QRMatrix,
  specs: FinderPatternSpec[],
  logger: DiagnosticSink,
): QRMatrix {
  const s = matrix.modulePixelSize;
  const { raster } = matrix;

  for (const spec of specs) {
    const { x, y } = finderOrigin(matrix, spec.position);
    const outer = spec.outerSideModules * s;
    const inner = spec.innerSideModules * s;
    const center = spec.centerSideModules * s;
    const innerOffset = (outer - inner) / 2;
    const centerOffset = (outer - center) / 2;

    raster.fillRect(x, y, outer, outer, spec.outerColor);
    raster.fillRect(x + innerOffset, y + innerOffset, inner, inner, spec.innerColor);
    raster.fillRect(x + centerOffset, y + centerOffset, center, center, spec.centerColor);
  }

  logger.info(`Painted ${specs.length} custom finder patterns.`);
  return matrix;
}
