import { toErrorMessage } from "../utils/errors.js";
import {
  type CapturedProcessOptions,
  type CapturedProcessResult,
  runCapturedProcess,
  toShellExitStatus,
} from "../utils/process.js";
import { HeaderPreparationError, PreprocessorError } from "./errors.js";

export type ProcessRunner = (
  options: CapturedProcessOptions,
) => Promise<CapturedProcessResult>;

export interface PreprocessHeaderOptions {
  compiler: string;
  headerPath: string;
  includeDirs: readonly string[];
  runner?: ProcessRunner;
}

export function buildPreprocessorArgs(
  headerPath: string,
  includeDirs: readonly string[],
): string[] {
  return [
    "-E",
    "-P",
    "-nostdinc",
    headerPath,
    ...includeDirs.map((dir) => `-I${dir}`),
  ];
}

export interface PreprocessedHeader {
  source: string;
  /** Non-empty stderr lines from a successful run. */
  diagnostics: string[];
}

/** Runs the C preprocessor over a header and returns the expanded source. */
export async function preprocessHeader(
  options: PreprocessHeaderOptions,
): Promise<PreprocessedHeader> {
  const { compiler, headerPath, includeDirs, runner = runCapturedProcess } =
    options;

  let result: CapturedProcessResult;
  try {
    result = await runner({
      command: compiler,
      args: buildPreprocessorArgs(headerPath, includeDirs),
    });
  } catch (error) {
    throw new HeaderPreparationError(
      `Failed to run preprocessor "${compiler}": ${toErrorMessage(error)}`,
      {
        hintLines: ["Install a C compiler or pass --cc <compiler>."],
        cause: error,
      },
    );
  }

  // A signal-killed run leaves truncated output behind.
  const status = toShellExitStatus(result);
  if (status !== 0) {
    throw new PreprocessorError(
      compiler,
      status,
      result.stderr,
      result.signal,
    );
  }

  return {
    source: result.stdout,
    diagnostics: result.stderr
      .split(/\r?\n/u)
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0),
  };
}
