// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { generateEmblemQr } from "./generate.js";
export type { GenerateDependencies, PipelineError } from "./generate.js";
export { QrcodeEncoder, createQRSpecification, moduleCountForVersion, rasterSide } from "./encoder.js";
export { paintFinderPatterns, finderPatternSpecs, finderOrigin, FINDER_POSITIONS, FINDER_MODULES } from "./finder.js";
export { generateEmblem, hexagonCenters, strokeWidthFor, HEXAGON_COUNT } from "./emblem.js";
export { compositeLogo, fitLogoSize } from "./logo.js";
export type { LogoPlacement } from "./logo.js";
export { overlayEmblem, coveragePercent, emblemDiameter, DEFAULT_COVERAGE_WARNING_PERCENT } from "./overlay.js";
export { addOuterBorder, saveImage } from "./assembler.js";
export type { SaveOptions } from "./assembler.js";
export { JsqrDecoder, validateOutput } from "./validate.js";
export type {
  ErrorCorrectionLevel,
  QRSpecification,
  QRMatrix,
  MatrixColors,
  Encoder,
  Decoder,
  FinderPosition,
  FinderPatternSpec,
  EmblemGeometry,
  OverlayResult,
  ValidationOutcome,
  GenerationReport,
} from "./types.js";
