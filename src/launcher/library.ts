import { readdir } from "node:fs/promises";
import { resolve as resolvePath } from "node:path";

import type { LauncherConfig } from "../configs/launcher/types.js";
import { resolvePackageRoot } from "../utils/cli-root.js";
import { isFile, isMissing } from "../utils/fs.js";
import { debug } from "../utils/log.js";
import { BindingLibraryNotFoundError } from "./errors.js";
import type { PreloadPlatform } from "./platform.js";

export const LIBRARY_PATH_ENV = "PRELOAD_LAUNCH_LIBRARY" as const;

export interface ResolveBindingLibraryOptions {
  /** Path given on the command line; wins over every other source. */
  explicitPath?: string;
  library: LauncherConfig["library"];
  platform: PreloadPlatform;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  packageRoot?: string;
}

export async function resolveBindingLibrary(
  options: ResolveBindingLibraryOptions,
): Promise<string> {
  const {
    explicitPath,
    library,
    platform,
    env = process.env,
    cwd = process.cwd(),
  } = options;

  if (explicitPath !== undefined && explicitPath.length > 0) {
    return await requireLibraryFile(resolvePath(cwd, explicitPath), "explicit");
  }

  const fromEnv = env[LIBRARY_PATH_ENV];
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return await requireLibraryFile(resolvePath(cwd, fromEnv), "environment");
  }

  if (library.path !== undefined) {
    return await requireLibraryFile(library.path, "config");
  }

  const packageRoot = options.packageRoot ?? resolvePackageRoot();
  const directory = resolvePath(packageRoot, library.directory);
  return await discoverLibrary(directory, library.basename, platform);
}

async function requireLibraryFile(
  path: string,
  source: "explicit" | "environment" | "config",
): Promise<string> {
  if (!(await isFile(path))) {
    throw new BindingLibraryNotFoundError({ location: path, source });
  }
  debug("resolved binding library", { path, source });
  return path;
}

async function discoverLibrary(
  directory: string,
  basename: string,
  platform: PreloadPlatform,
): Promise<string> {
  const pattern = `${basename}*${platform.extensionLabel}`;

  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    if (isMissing(error)) {
      throw new BindingLibraryNotFoundError({
        location: directory,
        source: "discovery",
        pattern,
      });
    }
    throw error;
  }

  const candidates = names
    .filter(
      (name) =>
        name.startsWith(basename) && platform.libraryExtension.test(name),
    )
    .sort();

  for (const candidate of candidates) {
    const candidatePath = resolvePath(directory, candidate);
    if (await isFile(candidatePath)) {
      debug("discovered binding library", {
        path: candidatePath,
        candidates,
      });
      return candidatePath;
    }
  }

  throw new BindingLibraryNotFoundError({
    location: directory,
    source: "discovery",
    pattern,
  });
}
