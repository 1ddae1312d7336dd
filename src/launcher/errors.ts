import { HintedError, type HintedErrorOptions } from "../utils/errors.js";

export type LauncherErrorKind = "platform" | "library" | "script" | "spawn";

export abstract class LauncherError extends HintedError {
  public abstract readonly kind: LauncherErrorKind;

  constructor(message: string, options: HintedErrorOptions = {}) {
    super(message, options);
  }
}

export class UnsupportedPlatformError extends LauncherError {
  public readonly kind = "platform" as const;

  constructor(public readonly platform: string) {
    super(`Preload injection is not supported on platform "${platform}".`, {
      hintLines: ["Supported platforms: linux, darwin."],
    });
    this.name = "UnsupportedPlatformError";
  }
}

export interface BindingLibraryNotFoundOptions {
  /** Where the library was expected. */
  location: string;
  source: "explicit" | "environment" | "config" | "discovery";
  pattern?: string;
}

export class BindingLibraryNotFoundError extends LauncherError {
  public readonly kind = "library" as const;

  constructor(options: BindingLibraryNotFoundOptions) {
    const { location, source, pattern } = options;
    const headline =
      source === "discovery"
        ? `No instrumentation binding library found in ${location}.`
        : `Instrumentation binding library not found at ${location}.`;
    super(headline, {
      detailLines: [
        `Resolved from: ${source}`,
        ...(pattern ? [`Expected file name: ${pattern}`] : []),
      ],
      hintLines: [
        "Pass --library <path> or set PRELOAD_LAUNCH_LIBRARY to the built shared object.",
      ],
    });
    this.name = "BindingLibraryNotFoundError";
  }
}

export class UnsafeLibraryPathError extends LauncherError {
  public readonly kind = "library" as const;

  constructor(
    public readonly libraryPath: string,
    preloadVariable: string,
  ) {
    super(`Binding library path cannot be preloaded: ${libraryPath}`, {
      detailLines: [
        `${preloadVariable} splits this path into several entries.`,
      ],
      hintLines: [
        "Move the library to a path without spaces or colons, or pass --library with one.",
      ],
    });
    this.name = "UnsafeLibraryPathError";
  }
}

export class ScriptNotFoundError extends LauncherError {
  public readonly kind = "script" as const;

  constructor(public readonly scriptPath: string) {
    super(`Instrumentation script not found: ${scriptPath}`);
    this.name = "ScriptNotFoundError";
  }
}

export class LaunchSpawnError extends LauncherError {
  public readonly kind = "spawn" as const;

  constructor(command: string, detail: string, cause?: unknown) {
    super(`Failed to launch "${command}": ${detail}`, {
      hintLines: ["Check that the target exists and is executable."],
      cause,
    });
    this.name = "LaunchSpawnError";
  }
}
