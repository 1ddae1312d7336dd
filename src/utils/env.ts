export interface OverlayEnvironmentOptions {
  base?: NodeJS.ProcessEnv;
}

/**
 * Copies the defined entries of a source environment into a fresh object.
 */
export function snapshotEnvironment(
  source: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv {
  const snapshot: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    snapshot[key] = value;
  }
  return snapshot;
}

export function overlayEnvironment(
  overrides?: Readonly<Record<string, string>>,
  options: OverlayEnvironmentOptions = {},
): NodeJS.ProcessEnv {
  const baseEnv = snapshotEnvironment(options.base ?? process.env);
  return overrides ? { ...baseEnv, ...overrides } : baseEnv;
}

export function prependPathList(
  existing: string | undefined,
  entry: string,
  separator: string,
): string {
  if (existing === undefined || existing.trim().length === 0) {
    return entry;
  }

  const entries = existing
    .split(separator)
    .filter((value) => value.length > 0 && value !== entry);
  return [entry, ...entries].join(separator);
}

export function isEnabledFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}
