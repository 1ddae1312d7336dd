import { afterEach, beforeEach } from "@jest/globals";

const LAUNCHER_ENV_PREFIX = "PRELOAD_LAUNCH_";

let originalExitCode: typeof process.exitCode;
let launcherEnv: [string, string | undefined][] = [];

beforeEach(() => {
  originalExitCode = process.exitCode;
  // Launcher variables from the host shell would leak into the CLI runs.
  launcherEnv = Object.entries(process.env).filter(([key]) =>
    key.startsWith(LAUNCHER_ENV_PREFIX),
  );
  for (const [key] of launcherEnv) {
    delete process.env[key];
  }
});

afterEach(() => {
  process.exitCode = originalExitCode ?? undefined;
  for (const [key, value] of launcherEnv) {
    process.env[key] = value;
  }
});
