// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { Raster, TRANSPARENT, parseColor, sameColor } from "./raster.js";
export type { Rgba } from "./raster.js";
export { regularPolygon, fillCircle, strokeCircle, strokeLine, strokePolygon } from "./draw.js";
export type { Point } from "./draw.js";
export { resize, enhanceContrast, luminance } from "./resample.js";
export { decodePng, encodePng, readPngFile } from "./png.js";
