// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Command } from "commander";
import { registerGenerateCommand } from "./generate.js";
import { registerVerifyCommand } from "./verify.js";

/** Build the `emblem-qr` command tree. */
export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name("emblem-qr")
    .description("Print-ready QR codes with a soccer-ball emblem and logo")
    .version(version);

  registerGenerateCommand(program);
  registerVerifyCommand(program);

  return program;
}
