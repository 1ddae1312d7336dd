import { dirname, isAbsolute, resolve as resolvePath } from "node:path";

import { ZodError } from "zod";

import {
  parseYamlDocument,
  type YamlParseErrorDetail,
} from "../../utils/yaml-reader.js";
import {
  type BaseConfigLoaderOptions,
  createConfigLoader,
} from "../shared/loader-factory.js";
import { formatYamlErrorDetail } from "../shared/yaml-error-formatter.js";
import {
  LauncherConfigParseError,
  MissingLauncherConfigError,
} from "./errors.js";
import {
  DEFAULT_LAUNCHER_CONFIG,
  type LauncherConfig,
  launcherConfigSchema,
  normalizeLauncherConfig,
} from "./types.js";

export const LAUNCHER_CONFIG_FILE = ".preload-launch.yaml" as const;
export const CONFIG_PATH_ENV = "PRELOAD_LAUNCH_CONFIG" as const;

export interface LoadLauncherConfigOptions extends BaseConfigLoaderOptions {
  env?: NodeJS.ProcessEnv;
}

const loadLauncherConfigInternal = createConfigLoader<
  LauncherConfig,
  LoadLauncherConfigOptions
>({
  resolveFilePath: (root, options) =>
    resolvePath(root, selectRequestedPath(options) ?? LAUNCHER_CONFIG_FILE),
  handleMissing: ({ filePath, options }) => {
    if (selectRequestedPath(options) !== undefined) {
      throw new MissingLauncherConfigError(filePath);
    }
    return DEFAULT_LAUNCHER_CONFIG;
  },
  parse: (content, { filePath }) => readLauncherConfig(content, filePath),
});

/**
 * Loads the launcher configuration. The default file is optional; a file
 * named through `filePath` or PRELOAD_LAUNCH_CONFIG must exist.
 */
export function loadLauncherConfig(
  options: LoadLauncherConfigOptions = {},
): LauncherConfig {
  return loadLauncherConfigInternal(options);
}

export function readLauncherConfig(
  content: string,
  filePath: string,
): LauncherConfig {
  const parsed = parseYamlDocument(content, {
    formatError: (detail: YamlParseErrorDetail) =>
      new LauncherConfigParseError(filePath, formatYamlErrorDetail(detail)),
  });

  const result = launcherConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new LauncherConfigParseError(
      filePath,
      formatSchemaIssues(result.error),
    );
  }

  const configDirectory = dirname(filePath);
  return normalizeLauncherConfig(result.data, (value) =>
    isAbsolute(value) ? value : resolvePath(configDirectory, value),
  );
}

function selectRequestedPath(
  options: LoadLauncherConfigOptions,
): string | undefined {
  if (options.filePath !== undefined) {
    return options.filePath;
  }
  const fromEnv = options.env?.[CONFIG_PATH_ENV];
  return fromEnv !== undefined && fromEnv.length > 0 ? fromEnv : undefined;
}

function formatSchemaIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
