import { tmpdir } from "node:os";
import { join } from "node:path";

import { Command } from "commander";

import {
  DEFAULT_COMPILER,
  DEFAULT_INCLUDE_DIR,
  prepareHeaders,
  type PreparedHeaders,
} from "../headers/builder.js";
import {
  DEFAULT_DROP_MARKERS,
  preloadCallbackPrefix,
} from "../headers/patchers.js";
import { renderHeadersTranscript } from "../render/transcripts/headers.js";
import { getLauncherVersion } from "../utils/version.js";
import { collectValues } from "./commander-utils.js";
import { writeCommandOutput } from "./output.js";

export const DEFAULT_HEADERS_OUT_DIR = join(tmpdir(), "preload-headers");

export interface HeadersCommandOptions {
  includeDir: string;
  headerDir: string;
  umbrella: string;
  preloadHeader: string;
  out: string;
  keepPrefix?: string;
  drop?: string[];
  dropPrefix?: string[];
  cc: string;
}

export async function runHeadersCommand(
  options: HeadersCommandOptions,
): Promise<PreparedHeaders> {
  return await prepareHeaders({
    includeDir: options.includeDir,
    headerDir: options.headerDir,
    umbrellaHeader: options.umbrella,
    preloadHeader: options.preloadHeader,
    outDir: options.out,
    keepPrefix: options.keepPrefix,
    dropMarkers: [...DEFAULT_DROP_MARKERS, ...(options.drop ?? [])],
    dropPrefixes: [
      preloadCallbackPrefix(options.preloadHeader),
      ...(options.dropPrefix ?? []),
    ],
    compiler: options.cc,
  });
}

export function createHeadersProgram(): Command {
  return new Command("preload-headers")
    .description(
      "Prepare instrumentation engine headers for an FFI declaration parser",
    )
    .version(
      getLauncherVersion(),
      "-v, --version",
      "print the launcher version",
    )
    .requiredOption("--header-dir <dir>", "header tree below the include dir")
    .requiredOption("--umbrella <file>", "umbrella header below the include dir")
    .requiredOption(
      "--preload-header <file>",
      "preload API header turned into the declaration list",
    )
    .option(
      "--include-dir <dir>",
      "installed headers root",
      DEFAULT_INCLUDE_DIR,
    )
    .option(
      "--out <dir>",
      "output directory (recreated)",
      DEFAULT_HEADERS_OUT_DIR,
    )
    .option(
      "--keep-prefix <prefix>",
      "system includes with this prefix stay active (default: header dir)",
    )
    .option(
      "--drop <marker>",
      "drop declaration lines containing marker, such as a variadic function name (repeatable)",
      collectValues,
    )
    .option(
      "--drop-prefix <prefix>",
      "drop declaration lines starting with prefix, besides the preload callbacks (repeatable)",
      collectValues,
    )
    .option("--cc <compiler>", "C preprocessor driver", DEFAULT_COMPILER)
    .allowExcessArguments(false)
    .exitOverride()
    .showHelpAfterError()
    .action(async (options: HeadersCommandOptions) => {
      const result = await runHeadersCommand(options);
      writeCommandOutput({
        body: renderHeadersTranscript(result),
        warnings: result.warnings,
      });
    });
}
