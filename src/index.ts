// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * emblem-qr - print-ready QR codes with a soccer-ball emblem and logo
 *
 * Encodes a URL at error-correction level H, repaints the finder patterns,
 * and places a procedurally drawn soccer ball carrying a logo in the middle
 * of the symbol.
 *
 * @packageDocumentation
 */

// QR pipeline namespace
export * as QR from "./qr/index.js";

// Imaging namespace (rasters, drawing, PNG I/O)
export * as Imaging from "./raster/index.js";

// Re-export the main entry points at top level for convenience
export { generateEmblemQr } from "./qr/generate.js";
export type { GenerationReport } from "./qr/types.js";

// Configuration
export { defineConfig, validateConfig, resolvePalette, DEFAULT_CONFIG } from "./config.js";
export type { EmblemQrConfig, EmblemQrConfigInput, ColorScheme, Palette } from "./config.js";

// Diagnostics
export { createConsoleSink, createMemorySink } from "./logger.js";
export type { DiagnosticSink, MemorySink, LogEntry, LogLevel, ConsoleSinkOptions } from "./logger.js";

// Results and errors
export { ok, err } from "./result.js";
export type { Result } from "./result.js";
export {
  EmblemQrError,
  ResourceNotFoundError,
  DecodeError,
  EncodingError,
  IOWriteError,
  ValidationMismatchError,
  ConfigError,
} from "./errors.js";
export type { ResourceKind } from "./errors.js";
