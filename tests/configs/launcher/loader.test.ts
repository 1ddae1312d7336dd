import { describe, expect, it } from "@jest/globals";

import {
  LauncherConfigParseError,
  MissingLauncherConfigError,
} from "../../../src/configs/launcher/errors.js";
import {
  CONFIG_PATH_ENV,
  loadLauncherConfig,
  readLauncherConfig,
} from "../../../src/configs/launcher/loader.js";
import { DEFAULT_LAUNCHER_CONFIG } from "../../../src/configs/launcher/types.js";

function missingFile(): never {
  const error = new Error("ENOENT: no such file") as NodeJS.ErrnoException;
  error.code = "ENOENT";
  throw error;
}

describe("loadLauncherConfig", () => {
  it("falls back to defaults when the default file is absent", () => {
    const config = loadLauncherConfig({
      root: "/work",
      env: {},
      readFile: missingFile,
    });

    expect(config).toEqual(DEFAULT_LAUNCHER_CONFIG);
  });

  it("requires an explicitly named file to exist", () => {
    expect(() =>
      loadLauncherConfig({
        root: "/work",
        filePath: "custom.yaml",
        env: {},
        readFile: missingFile,
      }),
    ).toThrow(MissingLauncherConfigError);
  });

  it("requires a file named through the environment to exist", () => {
    expect(() =>
      loadLauncherConfig({
        root: "/work",
        env: { [CONFIG_PATH_ENV]: "/etc/preload.yaml" },
        readFile: missingFile,
      }),
    ).toThrow("Missing launcher configuration at /etc/preload.yaml");
  });

  it("reads the default file from the root directory", () => {
    const requested: string[] = [];

    const config = loadLauncherConfig({
      root: "/work",
      env: {},
      readFile: (path) => {
        requested.push(path);
        return "library:\n  path: ./build/libpreload_binding.so\n";
      },
    });

    expect(requested).toEqual(["/work/.preload-launch.yaml"]);
    expect(config.library.path).toBe("/work/build/libpreload_binding.so");
  });
});

describe("readLauncherConfig", () => {
  const filePath = "/work/.preload-launch.yaml";

  it("treats an empty document as defaults", () => {
    expect(readLauncherConfig("\n", filePath)).toEqual(
      DEFAULT_LAUNCHER_CONFIG,
    );
  });

  it("normalizes every section", () => {
    const config = readLauncherConfig(
      [
        "library:",
        "  path: /opt/engine/libbinding.so",
        "  directory: lib",
        "  basename: libbinding",
        "env:",
        "  scriptVariable: ENGINE_SCRIPT",
        "  preloadVariable: LD_PRELOAD",
        "  preloadMode: prepend",
        "  extra:",
        '    ENGINE_LOG: "2"',
      ].join("\n"),
      filePath,
    );

    expect(config).toEqual({
      library: {
        path: "/opt/engine/libbinding.so",
        directory: "lib",
        basename: "libbinding",
      },
      env: {
        scriptVariable: "ENGINE_SCRIPT",
        preloadVariable: "LD_PRELOAD",
        preloadMode: "prepend",
        extra: { ENGINE_LOG: "2" },
      },
    });
  });

  it("reports YAML syntax errors with their location", () => {
    let caught: unknown;
    try {
      readLauncherConfig("library: [unterminated\n", filePath);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LauncherConfigParseError);
    expect((caught as Error).message).toMatch(
      /^Invalid launcher configuration \(\/work\/\.preload-launch\.yaml\): \(line \d+, column \d+\): /u,
    );
  });

  it("rejects unknown preload modes", () => {
    expect(() =>
      readLauncherConfig("env:\n  preloadMode: sideways\n", filePath),
    ).toThrow(
      "Invalid launcher configuration (/work/.preload-launch.yaml): env.preloadMode: Invalid enum value. Expected 'replace' | 'prepend', received 'sideways'",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => readLauncherConfig("librar: {}\n", filePath)).toThrow(
      "Unrecognized key(s) in object: 'librar'",
    );
  });

  it("rejects invalid variable names", () => {
    expect(() =>
      readLauncherConfig("env:\n  scriptVariable: 1BAD\n", filePath),
    ).toThrow(
      "env.scriptVariable: env.scriptVariable must be a valid environment variable name",
    );
  });
});
