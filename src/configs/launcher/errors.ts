import { HintedError } from "../../utils/errors.js";

const DEFAULT_LAUNCHER_CONFIG_ERROR_CONTEXT = "Invalid launcher configuration";

export class LauncherConfigError extends HintedError {
  constructor(message: string, hintLines: readonly string[] = []) {
    super(message, { hintLines });
    this.name = "LauncherConfigError";
  }
}

export class MissingLauncherConfigError extends LauncherConfigError {
  constructor(public readonly filePath: string) {
    super(`Missing launcher configuration at ${filePath}`, [
      "Pass an existing file to --config or unset PRELOAD_LAUNCH_CONFIG.",
    ]);
    this.name = "MissingLauncherConfigError";
  }
}

export class LauncherConfigParseError extends LauncherConfigError {
  constructor(
    public readonly filePath: string,
    detail?: string,
  ) {
    super(
      detail
        ? `${DEFAULT_LAUNCHER_CONFIG_ERROR_CONTEXT} (${filePath}): ${detail}`
        : `${DEFAULT_LAUNCHER_CONFIG_ERROR_CONTEXT} at ${filePath}`,
    );
    this.name = "LauncherConfigParseError";
  }
}
