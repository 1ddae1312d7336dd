import {
  copyFile,
  cp,
  mkdir,
  readdir,
  readFile,
  rm,
  writeFile,
} from "node:fs/promises";
import {
  basename,
  isAbsolute,
  join,
  relative,
  resolve,
  sep,
} from "node:path";

import { isDirectory, isFile } from "../utils/fs.js";
import { debug } from "../utils/log.js";
import {
  HeaderSourceMissingError,
  OutputOverlapsSourceError,
} from "./errors.js";
import {
  createDropPatcher,
  createIncludePatcher,
  DEFAULT_DROP_MARKERS,
  foldArithmetic,
  patchBitfields,
  patchDefine,
  patchLines,
  preloadCallbackPrefix,
} from "./patchers.js";
import { type ProcessRunner, preprocessHeader } from "./preprocessor.js";

const ATTRIBUTE_SHIM = "#define __attribute__(x)\n" as const;
export const DEFAULT_INCLUDE_DIR = "/usr/include" as const;
export const DEFAULT_COMPILER = "gcc" as const;
export const MAIN_HEADER_NAME = "main.h" as const;

export interface PrepareHeadersOptions {
  /** Directory holding the engine's installed headers. */
  includeDir?: string;
  /** Header tree below `includeDir`, copied as a whole. */
  headerDir: string;
  umbrellaHeader: string;
  preloadHeader: string;
  outDir: string;
  /** Angle-bracket includes with this prefix stay active. */
  keepPrefix?: string;
  dropMarkers?: readonly string[];
  /** Defaults to the preload callback prototypes. */
  dropPrefixes?: readonly string[];
  compiler?: string;
  runner?: ProcessRunner;
}

export interface PreparedHeaders {
  includeDir: string;
  patchedDir: string;
  preloaderDir: string;
  mainHeader: string;
  /** Headers rewritten in place across `include/` and `patched/`. */
  patchedHeaderCount: number;
  declarations: string;
  /** Preprocessor diagnostics from a run that still succeeded. */
  warnings: string[];
}

export async function prepareHeaders(
  options: PrepareHeadersOptions,
): Promise<PreparedHeaders> {
  const {
    includeDir = DEFAULT_INCLUDE_DIR,
    headerDir,
    umbrellaHeader,
    preloadHeader,
    outDir,
    keepPrefix = headerDir,
    dropMarkers = DEFAULT_DROP_MARKERS,
    dropPrefixes = [preloadCallbackPrefix(preloadHeader)],
    compiler = DEFAULT_COMPILER,
    runner,
  } = options;

  const sourceTree = join(includeDir, headerDir);
  const sourceUmbrella = join(includeDir, umbrellaHeader);
  const sourcePreload = join(includeDir, preloadHeader);
  if (!(await isDirectory(sourceTree))) {
    throw new HeaderSourceMissingError(sourceTree);
  }
  for (const source of [sourceUmbrella, sourcePreload]) {
    if (!(await isFile(source))) {
      throw new HeaderSourceMissingError(source);
    }
  }

  // The output directory is wiped below.
  if (containsPath(outDir, includeDir)) {
    throw new OutputOverlapsSourceError(outDir, includeDir);
  }

  const layout = {
    includeDir: join(outDir, "include"),
    patchedDir: join(outDir, "patched"),
    preloaderDir: join(outDir, "preloader"),
  };

  await rm(outDir, { recursive: true, force: true });
  for (const dir of Object.values(layout)) {
    await mkdir(dir, { recursive: true });
  }

  await copyHeaderTree(sourceTree, join(layout.includeDir, headerDir));
  await copyFile(
    sourceUmbrella,
    join(layout.includeDir, basename(umbrellaHeader)),
  );
  await copyFile(
    sourcePreload,
    join(layout.includeDir, basename(preloadHeader)),
  );

  await copyHeaderTree(sourceTree, join(layout.patchedDir, headerDir));
  await copyFile(
    sourceUmbrella,
    join(layout.patchedDir, basename(umbrellaHeader)),
  );

  const mainHeader = join(layout.preloaderDir, MAIN_HEADER_NAME);
  await copyFile(sourcePreload, mainHeader);

  const patchIncludes = createIncludePatcher(keepPrefix);
  let patchedHeaderCount = 0;

  for (const header of await listHeaders(layout.includeDir)) {
    await rewriteFile(header, patchBitfields);
    patchedHeaderCount += 1;
  }

  for (const header of await listHeaders(layout.patchedDir)) {
    await rewriteFile(header, (code) =>
      patchBitfields(patchLines(code, patchIncludes)),
    );
    patchedHeaderCount += 1;
  }

  debug("patched header trees", { outDir, patchedHeaderCount });

  const preloadSource = await readFile(mainHeader, "utf8");
  const preprocessorInput = patchLines(
    patchLines(`${ATTRIBUTE_SHIM}${preloadSource}`, patchIncludes),
    patchDefine,
  );
  await writeFile(mainHeader, preprocessorInput, "utf8");

  const { source: expanded, diagnostics } = await preprocessHeader({
    compiler,
    headerPath: mainHeader,
    includeDirs: [layout.patchedDir],
    runner,
  });

  const dropLines = createDropPatcher({
    markers: dropMarkers,
    prefixes: dropPrefixes,
  });
  const declarations = foldArithmetic(
    patchLines(patchBitfields(expanded), dropLines),
  );
  await writeFile(mainHeader, declarations, "utf8");

  return {
    ...layout,
    mainHeader,
    patchedHeaderCount,
    declarations,
    warnings: diagnostics,
  };
}

export async function listHeaders(root: string): Promise<string[]> {
  const found: string[] = [];
  const entries = await readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = join(root, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await listHeaders(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(".h")) {
      found.push(entryPath);
    }
  }
  return found.sort();
}

function containsPath(parent: string, child: string): boolean {
  const offset = relative(resolve(parent), resolve(child));
  if (offset === "") {
    return true;
  }
  return (
    offset !== ".." && !offset.startsWith(`..${sep}`) && !isAbsolute(offset)
  );
}

async function copyHeaderTree(source: string, target: string): Promise<void> {
  await cp(source, target, { recursive: true });
}

async function rewriteFile(
  path: string,
  transform: (code: string) => string,
): Promise<void> {
  const code = await readFile(path, "utf8");
  await writeFile(path, transform(code), "utf8");
}
