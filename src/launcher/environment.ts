import type { PreloadMode } from "../configs/launcher/types.js";
import { overlayEnvironment, prependPathList } from "../utils/env.js";

export interface ComposeLaunchEnvironmentOptions {
  base?: NodeJS.ProcessEnv;
  preloadVariable: string;
  /** Separator for the preload list when prepending. */
  separator: string;
  libraryPath: string;
  scriptVariable: string;
  scriptPath: string;
  mode?: PreloadMode;
  extra?: Readonly<Record<string, string>>;
}

/**
 * Builds the child environment from a snapshot of `base`; `base` itself is
 * never written to.
 */
export function composeLaunchEnvironment(
  options: ComposeLaunchEnvironmentOptions,
): NodeJS.ProcessEnv {
  const {
    base = process.env,
    preloadVariable,
    separator,
    libraryPath,
    scriptVariable,
    scriptPath,
    mode = "replace",
    extra = {},
  } = options;

  const launchEnv = overlayEnvironment(extra, { base });

  launchEnv[scriptVariable] = scriptPath;
  launchEnv[preloadVariable] =
    mode === "prepend"
      ? prependPathList(base[preloadVariable], libraryPath, separator)
      : libraryPath;

  return launchEnv;
}
