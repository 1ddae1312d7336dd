import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;
const PACKAGE_ROOT_ERROR_MESSAGE =
  "Unable to locate the preload-launch install directory. Ensure the launcher is running from its installed package." as const;

let cachedPackageRoot: string | undefined;

export function resolvePackageRoot(): string {
  if (cachedPackageRoot) {
    return cachedPackageRoot;
  }

  const helperDirectory = __dirname;
  const derivedRoot = ascendToPackageRoot(helperDirectory);
  if (derivedRoot) {
    cachedPackageRoot = derivedRoot;
    return cachedPackageRoot;
  }

  throw buildResolutionError(
    `Attempted discovery starting from "${helperDirectory}".`,
  );
}

export function getPackageAssetPath(...segments: string[]): string {
  const root = resolvePackageRoot();
  return resolveNative(root, ...segments);
}

function ascendToPackageRoot(start: string): string | undefined {
  let current = start;

  while (true) {
    if (isPackageRoot(current)) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

function isPackageRoot(candidate: string): boolean {
  const packagePath = resolveNative(candidate, PACKAGE_JSON_FILENAME);
  return existsSync(packagePath);
}

function buildResolutionError(detail: string): Error {
  return new Error(`${PACKAGE_ROOT_ERROR_MESSAGE} ${detail}`);
}
