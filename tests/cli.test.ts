// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createProgram } from "../src/cli/program.js";
import { configFromOptions } from "../src/cli/generate.js";
import { ConfigError } from "../src/errors.js";
import { GREEN, writeSolidLogo } from "./helpers/images.js";

function run(args: string[]): void {
  createProgram("1.2.3").parse(args, { from: "user" });
}

// ---------------------------------------------------------------------------
// option mapping
// ---------------------------------------------------------------------------

describe("configFromOptions", () => {
  it("maps flags onto configuration fields", () => {
    const config = configFromOptions({
      url: "https://club.example.org",
      logo_path: "crest.png",
      output_path: "out/qr.png",
      validate: true,
      moduleSize: "20",
      border: "4",
      outerBorder: "0",
      emblemRatio: "0.2",
      logoRatio: "0.5",
      contrast: "1",
      mkdir: true,
    });

    expect(config.data).toBe("https://club.example.org");
    expect(config.logoPath).toBe("crest.png");
    expect(config.outputPath).toBe("out/qr.png");
    expect(config.validate).toBe(true);
    expect(config.modulePixelSize).toBe(20);
    expect(config.borderModules).toBe(4);
    expect(config.outerBorderPx).toBe(0);
    expect(config.emblemRatio).toBe(0.2);
    expect(config.logoRatio).toBe(0.5);
    expect(config.logoContrast).toBe(1);
    expect(config.createOutputDirectory).toBe(true);
  });

  it("keeps defaults for absent flags", () => {
    const config = configFromOptions({});
    expect(config.modulePixelSize).toBe(35);
    expect(config.validate).toBe(false);
    expect(config.createOutputDirectory).toBe(false);
  });

  it("rejects values that are not numbers", () => {
    expect(() => configFromOptions({ moduleSize: "big" })).toThrow(ConfigError);
  });
});

// ---------------------------------------------------------------------------
// commands
// ---------------------------------------------------------------------------

describe("CLI", () => {
  let tempDir: string;
  let logoPath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "emblem-cli-"));
    logoPath = writeSolidLogo(tempDir, "logo.png", 64, 64, GREEN);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  function generate(outputPath: string, ...extra: string[]): void {
    run([
      "--url", "https://example.org",
      "--logo_path", logoPath,
      "--output_path", outputPath,
      "--module-size", "10",
      "--border", "4",
      ...extra,
    ]);
  }

  it("lists both commands in its help", () => {
    const help = createProgram("1.2.3").helpInformation();
    expect(help).toContain("emblem-qr");
    expect(help).toContain("generate");
    expect(help).toContain("verify");
  });

  it("runs generate when no command is named", () => {
    const outputPath = join(tempDir, "qr.png");
    generate(outputPath);

    expect(existsSync(outputPath)).toBe(true);
    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.endsWith(" - INFO - ===== Generation Successful ====="))).toBe(true);
  });

  it("prints the report as JSON with --json", () => {
    const outputPath = join(tempDir, "qr.png");
    generate(outputPath, "--json");

    expect(log).toHaveBeenCalledTimes(1);
    const report: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(report).toMatchObject({ data: "https://example.org", version: 3, validation: "skipped" });
  });

  it("exits 0 without output when the logo is missing", () => {
    const outputPath = join(tempDir, "qr.png");
    run(["--logo_path", join(tempDir, "absent.png"), "--output_path", outputPath]);

    expect(existsSync(outputPath)).toBe(false);
    const lines = error.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes("===== Generation Failed ====="))).toBe(true);
  });

  it("exits 1 on an invalid option value", () => {
    expect(() => run(["--module-size", "0"])).toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      "Error: Invalid configuration: modulePixelSize must be a positive integer (got 0)",
    );
  });

  it("verify exits 0 when the image decodes to the expected data", () => {
    const outputPath = join(tempDir, "qr.png");
    generate(outputPath);
    log.mockClear();

    expect(() => run(["verify", outputPath, "--expect", "https://example.org"])).toThrow("exit 0");
    expect(log).toHaveBeenCalledWith("\x1b[32m✓ Decoded data matches\x1b[0m");
  });

  it("verify exits 1 on a mismatch and reports JSON", () => {
    const outputPath = join(tempDir, "qr.png");
    generate(outputPath);
    log.mockClear();

    expect(() => run(["verify", outputPath, "--expect", "https://example.net", "--json"])).toThrow("exit 1");
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      valid: false,
      expected: "https://example.net",
      found: "https://example.org",
      error: 'Decoded data does not match: expected "https://example.net", found "https://example.org"',
    });
  });

  it("verify exits 1 for a missing image", () => {
    expect(() => run(["verify", join(tempDir, "absent.png"), "--expect", "x"])).toThrow("exit 1");
  });
});
