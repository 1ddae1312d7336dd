import { z } from "zod";

export const DEFAULT_LIBRARY_DIRECTORY = "native" as const;
export const DEFAULT_LIBRARY_BASENAME = "libpreload_binding" as const;
export const DEFAULT_SCRIPT_VARIABLE = "PRELOAD_LAUNCH_SCRIPT" as const;

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/u;

function createEnvNameSchema(label: string) {
  return z.string().regex(ENV_NAME_PATTERN, {
    message: `${label} must be a valid environment variable name`,
  });
}

function createPathSchema(label: string) {
  return z
    .string()
    .min(1, { message: `${label} must be a non-empty string` })
    .refine((value) => !value.includes("\0"), {
      message: `${label} may not contain null bytes`,
    });
}

export const preloadModeSchema = z.enum(["replace", "prepend"]);
export type PreloadMode = z.infer<typeof preloadModeSchema>;

const libraryConfigSchema = z
  .object({
    path: createPathSchema("library.path").optional(),
    directory: createPathSchema("library.directory").optional(),
    basename: z
      .string()
      .min(1, { message: "library.basename must be a non-empty string" })
      .refine((value) => !value.includes("/") && !value.includes("\\"), {
        message: "library.basename may not contain path separators",
      })
      .optional(),
  })
  .strict();

const envConfigSchema = z
  .object({
    scriptVariable: createEnvNameSchema("env.scriptVariable").optional(),
    preloadVariable: createEnvNameSchema("env.preloadVariable").optional(),
    preloadMode: preloadModeSchema.optional(),
    extra: z.record(createEnvNameSchema("env.extra key"), z.string()).optional(),
  })
  .strict();

export const launcherConfigSchema = z
  .object({
    library: libraryConfigSchema.optional(),
    env: envConfigSchema.optional(),
  })
  .strict();

export type LauncherConfigInput = z.infer<typeof launcherConfigSchema>;

export interface LauncherConfig {
  library: {
    /** Absolute once loaded; relative entries resolve against the config file. */
    path?: string;
    directory: string;
    basename: string;
  };
  env: {
    scriptVariable: string;
    preloadVariable?: string;
    preloadMode: PreloadMode;
    extra: Record<string, string>;
  };
}

export const DEFAULT_LAUNCHER_CONFIG: LauncherConfig = {
  library: {
    directory: DEFAULT_LIBRARY_DIRECTORY,
    basename: DEFAULT_LIBRARY_BASENAME,
  },
  env: {
    scriptVariable: DEFAULT_SCRIPT_VARIABLE,
    preloadMode: "replace",
    extra: {},
  },
};

export function normalizeLauncherConfig(
  input: LauncherConfigInput,
  resolveRelative: (path: string) => string,
): LauncherConfig {
  const library = input.library ?? {};
  const env = input.env ?? {};

  return {
    library: {
      ...(library.path !== undefined
        ? { path: resolveRelative(library.path) }
        : {}),
      directory: library.directory ?? DEFAULT_LIBRARY_DIRECTORY,
      basename: library.basename ?? DEFAULT_LIBRARY_BASENAME,
    },
    env: {
      scriptVariable: env.scriptVariable ?? DEFAULT_SCRIPT_VARIABLE,
      ...(env.preloadVariable !== undefined
        ? { preloadVariable: env.preloadVariable }
        : {}),
      preloadMode: env.preloadMode ?? "replace",
      extra: { ...(env.extra ?? {}) },
    },
  };
}
