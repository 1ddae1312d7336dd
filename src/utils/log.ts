import { isEnabledFlag } from "./env.js";

const LOG_PREFIX = "[preload-launch]" as const;
export const DEBUG_ENV = "PRELOAD_LAUNCH_DEBUG" as const;

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isEnabledFlag(env[DEBUG_ENV]);
}

export function debug(message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  const suffix = data !== undefined ? ` ${JSON.stringify(data)}` : "";
  process.stderr.write(
    `${LOG_PREFIX} debug ${new Date().toISOString()} ${message}${suffix}\n`,
  );
}

export function logError(message: string): void {
  console.error(`${LOG_PREFIX} ${message}`);
}
