// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { ValidationMismatchError } from "../errors.js";
import { createConsoleSink } from "../logger.js";
import { JsqrDecoder, validateOutput } from "../qr/validate.js";

export function registerVerifyCommand(program: Command): void {
  program
    .command("verify <image>")
    .description("Decode a QR code PNG and compare it with the expected data")
    .requiredOption("--expect <data>", "Data the image should decode to")
    .option("--json", "Output result as JSON")
    .action((image: string, opts: { expect: string; json?: boolean }) => {
      let valid = false;
      try {
        const logger = createConsoleSink({ infoStream: opts.json ? "stderr" : "stdout" });
        const result = validateOutput(image, opts.expect, new JsqrDecoder(), logger);
        valid = result.ok;

        if (opts.json) {
          console.log(JSON.stringify({
            valid,
            expected: opts.expect,
            found: result.ok ? result.value : result.error instanceof ValidationMismatchError ? result.error.found : null,
            error: result.ok ? undefined : result.error.message,
          }, null, 2));
        } else if (result.ok) {
          console.log(`\x1b[32m✓ Decoded data matches\x1b[0m`);
        } else {
          console.error(`\x1b[31m✗ ${result.error.message}\x1b[0m`);
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exit(valid ? 0 : 1);
    });
}
