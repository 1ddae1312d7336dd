import { readFileSync } from "node:fs";

import { getPackageAssetPath } from "./cli-root.js";

let cachedVersion: string | undefined;

export function getLauncherVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const packageJsonPath = getPackageAssetPath("package.json");
    const packageJsonRaw = readFileSync(packageJsonPath, "utf-8");
    const packageJson = JSON.parse(packageJsonRaw) as {
      version?: unknown;
    };

    if (typeof packageJson.version === "string") {
      const normalizedVersion = packageJson.version.trim();
      if (normalizedVersion) {
        cachedVersion = normalizedVersion;
        return cachedVersion;
      }
    }
  } catch {
    // Unreadable package metadata falls through to "unknown".
  }

  cachedVersion = "unknown";
  return cachedVersion;
}
