#!/usr/bin/env node
import { CommanderError } from "commander";

import { errorMessage } from "@patchdrop/auth";

import { configFromEnv } from "./config.js";
import { createProgram } from "./program.js";

async function main() {
  const program = createProgram({ config: configFromEnv() });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  // Commander has already printed usage errors and help.
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(`patchdrop: ${errorMessage(err)}`);
  process.exitCode = 1;
});
