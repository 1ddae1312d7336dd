import { Command } from "commander";

import { loadLauncherConfig } from "../configs/launcher/loader.js";
import { launchInstrumented, type LaunchResult } from "../launcher/launch.js";
import { getLauncherVersion } from "../utils/version.js";
import { writeCommandOutput } from "./output.js";

export interface LaunchCommandInput {
  scriptPath: string;
  command: string;
  args: readonly string[];
  library?: string;
  config?: string;
}

export async function runLaunchCommand(
  input: LaunchCommandInput,
): Promise<LaunchResult> {
  const config = loadLauncherConfig({
    filePath: input.config,
    env: process.env,
  });

  return await launchInstrumented({
    scriptPath: input.scriptPath,
    command: input.command,
    args: input.args,
    config,
    libraryPath: input.library,
  });
}

interface LaunchActionOptions {
  library?: string;
  config?: string;
}

export function createLaunchProgram(): Command {
  const program = new Command("preload-launch");

  program
    .description(
      "Run a target executable with the instrumentation binding preloaded",
    )
    .version(
      getLauncherVersion(),
      "-v, --version",
      "print the launcher version",
    )
    .usage("[options] <script> <target> [args...]")
    .option("--library <path>", "binding library to preload")
    .option("--config <path>", "launcher configuration file")
    .argument("[script]", "instrumentation script for the preloaded library")
    .argument("[target]", "executable to launch")
    .argument("[args...]", "arguments passed to the target unchanged")
    .passThroughOptions()
    .exitOverride()
    .showHelpAfterError()
    .action(
      async (
        script: string | undefined,
        target: string | undefined,
        args: string[],
        options: LaunchActionOptions,
      ) => {
        if (script === undefined || target === undefined) {
          writeCommandOutput({ body: program.helpInformation() });
          return;
        }

        const result = await runLaunchCommand({
          scriptPath: script,
          command: target,
          args,
          library: options.library,
          config: options.config,
        });
        process.exitCode = result.exitCode;
      },
    );

  return program;
}
