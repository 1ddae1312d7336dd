import { resolve as resolvePath } from "node:path";

import type { LauncherConfig } from "../configs/launcher/types.js";
import { toErrorMessage } from "../utils/errors.js";
import { isFile } from "../utils/fs.js";
import { debug } from "../utils/log.js";
import {
  type ProcessExit,
  spawnInheritedProcess,
  toShellExitStatus,
} from "../utils/process.js";
import { composeLaunchEnvironment } from "./environment.js";
import {
  LaunchSpawnError,
  ScriptNotFoundError,
  UnsafeLibraryPathError,
} from "./errors.js";
import { resolveBindingLibrary } from "./library.js";
import { resolvePreloadPlatform } from "./platform.js";

export interface LaunchInstrumentedOptions {
  scriptPath: string;
  command: string;
  args?: readonly string[];
  config: LauncherConfig;
  libraryPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  packageRoot?: string;
}

export interface LaunchResult {
  /** Shell-style status: the child's exit code, or 128 + signal number. */
  exitCode: number;
  signal: NodeJS.Signals | null;
  libraryPath: string;
  env: NodeJS.ProcessEnv;
}

export async function launchInstrumented(
  options: LaunchInstrumentedOptions,
): Promise<LaunchResult> {
  const {
    scriptPath,
    command,
    args = [],
    config,
    env = process.env,
    cwd = process.cwd(),
  } = options;

  if (!(await isFile(resolvePath(cwd, scriptPath)))) {
    throw new ScriptNotFoundError(scriptPath);
  }

  const platform = resolvePreloadPlatform(options.platform);
  const libraryPath = await resolveBindingLibrary({
    explicitPath: options.libraryPath,
    library: config.library,
    platform,
    env,
    cwd,
    packageRoot: options.packageRoot,
  });

  const preloadVariable = config.env.preloadVariable ?? platform.variable;
  if (platform.listDelimiters.test(libraryPath)) {
    throw new UnsafeLibraryPathError(libraryPath, preloadVariable);
  }
  const launchEnv = composeLaunchEnvironment({
    base: env,
    preloadVariable,
    separator: platform.separator,
    libraryPath,
    scriptVariable: config.env.scriptVariable,
    scriptPath,
    mode: config.env.preloadMode,
    extra: config.env.extra,
  });

  debug("launching instrumented target", {
    command,
    args,
    [preloadVariable]: launchEnv[preloadVariable],
    [config.env.scriptVariable]: scriptPath,
  });

  let exit: ProcessExit;
  try {
    exit = await spawnInheritedProcess({
      command,
      args,
      cwd,
      env: launchEnv,
    });
  } catch (error) {
    throw new LaunchSpawnError(command, toErrorMessage(error), error);
  }

  debug("instrumented target exited", exit);

  return {
    exitCode: toShellExitStatus(exit),
    signal: exit.signal,
    libraryPath,
    env: launchEnv,
  };
}
