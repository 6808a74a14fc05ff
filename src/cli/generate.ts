// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { defineConfig, DEFAULT_CONFIG } from "../config.js";
import type { EmblemQrConfig } from "../config.js";
import { createConsoleSink } from "../logger.js";
import { generateEmblemQr } from "../qr/generate.js";

/** Raw option values as commander hands them over. */
export interface GenerateCommandOptions {
  url?: string;
  logo_path?: string;
  output_path?: string;
  validate?: boolean;
  moduleSize?: string;
  border?: string;
  outerBorder?: string;
  emblemRatio?: string;
  logoRatio?: string;
  contrast?: string;
  mkdir?: boolean;
  json?: boolean;
}

/**
 * Turn command-line options into a validated configuration. Absent flags
 * keep their defaults.
 *
 * @throws ConfigError when a value is out of range or not a number
 */
export function configFromOptions(opts: GenerateCommandOptions): EmblemQrConfig {
  return defineConfig({
    data: opts.url,
    logoPath: opts.logo_path,
    outputPath: opts.output_path,
    validate: opts.validate,
    modulePixelSize: toNumber(opts.moduleSize),
    borderModules: toNumber(opts.border),
    outerBorderPx: toNumber(opts.outerBorder),
    emblemRatio: toNumber(opts.emblemRatio),
    logoRatio: toNumber(opts.logoRatio),
    logoContrast: toNumber(opts.contrast),
    createOutputDirectory: opts.mkdir,
  });
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate", { isDefault: true })
    .description("Generate a QR code with a soccer-ball emblem and logo in the middle")
    .option("--url <string>", "URL (or any text) to encode", DEFAULT_CONFIG.data)
    .option("--logo_path <path>", "PNG logo placed inside the emblem", DEFAULT_CONFIG.logoPath)
    .option("--output_path <path>", "Where to save the final PNG", DEFAULT_CONFIG.outputPath)
    .option("--validate", "Decode the saved image and compare it with the URL")
    .option("--module-size <px>", "Pixels per QR module")
    .option("--border <modules>", "Quiet zone width in modules")
    .option("--outer-border <px>", "Extra border around the whole image in pixels")
    .option("--emblem-ratio <ratio>", "Emblem diameter relative to the QR height")
    .option("--logo-ratio <ratio>", "Logo size relative to the emblem diameter")
    .option("--contrast <factor>", "Logo contrast factor (1 disables)")
    .option("--mkdir", "Create the output directory if it does not exist")
    .option("--json", "Print the generation report as JSON")
    .action((opts: GenerateCommandOptions) => {
      try {
        const config = configFromOptions(opts);
        const logger = createConsoleSink({ infoStream: opts.json ? "stderr" : "stdout" });

        logger.info("Starting emblem QR code generator...");
        const result = generateEmblemQr(config, { logger });

        if (!result.ok) {
          // The missing output file is the failure signal; the exit status stays 0.
          logger.error("===== Generation Failed =====");
          return;
        }

        logger.info("===== Generation Successful =====");
        if (opts.json) {
          console.log(JSON.stringify(result.value, null, 2));
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}
