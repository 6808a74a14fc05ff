/**
 * emblem-qr: end-to-end demo
 *
 * Draws a simple crest, then builds an emblem QR code around it and checks
 * that the result still scans.
 *
 * Usage:
 *   npx tsx examples/demo.ts                                  # defaults
 *   npx tsx examples/demo.ts --url https://club.example.org   # custom data
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Imaging, createConsoleSink, defineConfig, generateEmblemQr } from "../src/index.js";

// ---------------------------------------------------------------------------
// CLI argument parsing (no deps)
// ---------------------------------------------------------------------------

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= process.argv.length) return undefined;
  return process.argv[idx + 1];
}

const url = getArg("url") ?? "https://example.org/fixtures";
const outputDir = "./emblem-output";

// ---------------------------------------------------------------------------
// Crest
// ---------------------------------------------------------------------------

function drawCrest(size: number): Imaging.Raster {
  const crest = Imaging.Raster.filled(size, size, Imaging.TRANSPARENT);
  const center = { x: size / 2, y: size / 2 };
  const navy = { r: 0, g: 0, b: 102, a: 255 };
  const red = { r: 200, g: 16, b: 46, a: 255 };

  Imaging.fillCircle(crest, center, size / 2, navy);
  Imaging.fillCircle(crest, center, size / 3, red);
  Imaging.strokePolygon(crest, Imaging.regularPolygon(center, size / 4, 5, -90), Math.max(1, size / 40), navy);
  return crest;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  console.log("=== emblem-qr Demo ===\n");

  mkdirSync(outputDir, { recursive: true });
  const logoPath = join(outputDir, "crest.png");
  writeFileSync(logoPath, Imaging.encodePng(drawCrest(240)));
  console.log(`Crest written to ${logoPath}\n`);

  const config = defineConfig({
    data: url,
    logoPath,
    outputPath: join(outputDir, "emblem_qr.png"),
    validate: true,
  });

  const result = generateEmblemQr(config, { logger: createConsoleSink() });
  if (!result.ok) {
    console.error(`\nGeneration failed: ${result.error.message}`);
    process.exit(1);
  }

  const report = result.value;
  console.log("\n--- Emblem QR Created ---");
  console.log(`  Data:       ${report.data}`);
  console.log(`  Version:    ${report.version} (${report.moduleCount}x${report.moduleCount} modules)`);
  console.log(`  Image:      ${report.width}x${report.height}px`);
  console.log(`  Emblem:     ${report.emblemDiameter}px, covering ${report.coveragePercent.toFixed(1)}%`);
  console.log(`  Validation: ${report.validation}`);
  console.log(`  File:       ${report.outputPath}`);

  console.log("\nDone!");
}

main();
