import { describe, expect, it } from "@jest/globals";

import { composeLaunchEnvironment } from "../../src/launcher/environment.js";

describe("composeLaunchEnvironment", () => {
  it("sets the preload and script variables on a copy of the base", () => {
    const base: NodeJS.ProcessEnv = {
      PATH: "/usr/bin",
      HOME: "/home/test",
      LD_PRELOAD: "/lib/previous.so",
    };

    const env = composeLaunchEnvironment({
      base,
      preloadVariable: "LD_PRELOAD",
      separator: ":",
      libraryPath: "/opt/native/libpreload_binding.so",
      scriptVariable: "PRELOAD_LAUNCH_SCRIPT",
      scriptPath: "hooks/trace.py",
    });

    expect(env).toEqual({
      PATH: "/usr/bin",
      HOME: "/home/test",
      LD_PRELOAD: "/opt/native/libpreload_binding.so",
      PRELOAD_LAUNCH_SCRIPT: "hooks/trace.py",
    });
    expect(base).toEqual({
      PATH: "/usr/bin",
      HOME: "/home/test",
      LD_PRELOAD: "/lib/previous.so",
    });
  });

  it("prepends to an inherited preload list in prepend mode", () => {
    const env = composeLaunchEnvironment({
      base: { DYLD_INSERT_LIBRARIES: "/usr/lib/libprofile.dylib" },
      preloadVariable: "DYLD_INSERT_LIBRARIES",
      separator: ":",
      libraryPath: "/opt/libpreload_binding.dylib",
      scriptVariable: "PRELOAD_LAUNCH_SCRIPT",
      scriptPath: "/tmp/script.py",
      mode: "prepend",
    });

    expect(env.DYLD_INSERT_LIBRARIES).toBe(
      "/opt/libpreload_binding.dylib:/usr/lib/libprofile.dylib",
    );
  });

  it("applies extra variables before the launcher's own", () => {
    const env = composeLaunchEnvironment({
      base: {},
      preloadVariable: "LD_PRELOAD",
      separator: ":",
      libraryPath: "/opt/lib.so",
      scriptVariable: "ENGINE_SCRIPT",
      scriptPath: "a.py",
      extra: { ENGINE_LOG: "debug", ENGINE_SCRIPT: "ignored.py" },
    });

    expect(env).toEqual({
      ENGINE_LOG: "debug",
      ENGINE_SCRIPT: "a.py",
      LD_PRELOAD: "/opt/lib.so",
    });
  });
});
