import { UnsupportedPlatformError } from "./errors.js";

export interface PreloadPlatform {
  /** Variable the dynamic loader reads to inject libraries at startup. */
  variable: string;
  separator: string;
  /** Matches shared-object file name suffixes, versioned ones included. */
  libraryExtension: RegExp;
  extensionLabel: string;
  /** Characters the loader treats as list delimiters in `variable`. */
  listDelimiters: RegExp;
}

const PRELOAD_PLATFORMS: Partial<Record<NodeJS.Platform, PreloadPlatform>> = {
  linux: {
    variable: "LD_PRELOAD",
    separator: ":",
    libraryExtension: /\.so(\.\d+)*$/u,
    extensionLabel: ".so",
    listDelimiters: /[\s:]/u,
  },
  darwin: {
    variable: "DYLD_INSERT_LIBRARIES",
    separator: ":",
    libraryExtension: /\.dylib$/u,
    extensionLabel: ".dylib",
    listDelimiters: /:/u,
  },
};

export function resolvePreloadPlatform(
  platform: NodeJS.Platform = process.platform,
): PreloadPlatform {
  const resolved = PRELOAD_PLATFORMS[platform];
  if (!resolved) {
    throw new UnsupportedPlatformError(platform);
  }
  return resolved;
}
