// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Base error class for all emblem-qr errors.
 */
export class EmblemQrError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmblemQrError";
    Object.setPrototypeOf(this, EmblemQrError.prototype);
  }
}

/** What a {@link ResourceNotFoundError} was looking for. */
export type ResourceKind = "logo" | "output-directory" | "image";

/**
 * Error returned when a logo, an image to verify, or the output
 * directory does not exist.
 */
export class ResourceNotFoundError extends EmblemQrError {
  readonly resource: ResourceKind;
  readonly path: string;

  constructor(resource: ResourceKind, path: string) {
    super(`${describeResource(resource)} not found: '${path}'`);
    this.name = "ResourceNotFoundError";
    this.resource = resource;
    this.path = path;
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Error returned when an image file exists but cannot be read as a PNG.
 */
export class DecodeError extends EmblemQrError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to read image '${path}': ${reason}`);
    this.name = "DecodeError";
    this.path = path;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Error returned when the data cannot be encoded as a QR symbol at the
 * requested error-correction level.
 */
export class EncodingError extends EmblemQrError {
  readonly dataLength: number;

  constructor(message: string, dataLength: number) {
    super(message);
    this.name = "EncodingError";
    this.dataLength = dataLength;
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Error returned when the final image cannot be written.
 */
export class IOWriteError extends EmblemQrError {
  readonly path: string;
  /** Node.js error code (EACCES, ENOSPC, ...), when one was reported */
  readonly code: string | undefined;

  constructor(path: string, reason: string, code?: string) {
    super(`Failed to save image to '${path}': ${reason}`);
    this.name = "IOWriteError";
    this.path = path;
    this.code = code;
    Object.setPrototypeOf(this, IOWriteError.prototype);
  }
}

/**
 * Advisory error: the saved image did not decode to the expected payload.
 */
export class ValidationMismatchError extends EmblemQrError {
  readonly expected: string;
  /** Decoded payload, or null when no QR symbol was found */
  readonly found: string | null;

  constructor(expected: string, found: string | null) {
    super(
      found === null
        ? "No QR code found in the generated image"
        : `Decoded data does not match: expected "${expected}", found "${found}"`,
    );
    this.name = "ValidationMismatchError";
    this.expected = expected;
    this.found = found;
    Object.setPrototypeOf(this, ValidationMismatchError.prototype);
  }
}

/**
 * Error thrown when configuration values fail validation.
 */
export class ConfigError extends EmblemQrError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function describeResource(resource: ResourceKind): string {
  switch (resource) {
    case "logo":
      return "Logo file";
    case "output-directory":
      return "Output directory";
    case "image":
      return "Image file";
  }
}

/** Extract a Node.js error code (e.g. "ENOENT") from an unknown thrown value. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Human-readable message for an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
