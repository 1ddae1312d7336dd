#!/usr/bin/env node

import process from "node:process";

import { createHeadersProgram } from "./cli/headers.js";
import { runProgram } from "./cli/program.js";
import { toErrorMessage } from "./utils/errors.js";
import { logError } from "./utils/log.js";

export async function runHeadersCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  await runProgram(createHeadersProgram(), argv);
}

if (require.main === module) {
  runHeadersCli().catch((error: unknown) => {
    logError(`Unexpected error: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
}
