import { type Command, CommanderError } from "commander";

import { renderCliError } from "../render/utils/errors.js";
import { toErrorMessage } from "../utils/errors.js";
import { commanderAlreadyRendered } from "./commander-utils.js";
import { CliError, toCliError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

/**
 * Parses argv with a configured program and turns every failure into a
 * rendered error plus a non-zero exit code.
 */
export async function runProgram(
  program: Command,
  argv: readonly string[],
): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        stderr: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      stderr: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}
