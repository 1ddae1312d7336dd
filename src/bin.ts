#!/usr/bin/env node

import process from "node:process";

import { createLaunchProgram } from "./cli/launch.js";
import { runProgram } from "./cli/program.js";
import { toErrorMessage } from "./utils/errors.js";
import { logError } from "./utils/log.js";

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  await runProgram(createLaunchProgram(), argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    logError(`Unexpected error: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
}
