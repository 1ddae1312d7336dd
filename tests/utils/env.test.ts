import { describe, expect, it } from "@jest/globals";

import {
  isEnabledFlag,
  overlayEnvironment,
  prependPathList,
  snapshotEnvironment,
} from "../../src/utils/env.js";

describe("environment helpers", () => {
  it("snapshots defined entries into a new object", () => {
    const source: NodeJS.ProcessEnv = {
      PATH: "/bin",
      HOME: "/home/test",
      EMPTY: undefined,
    };

    const snapshot = snapshotEnvironment(source);

    expect(snapshot).toEqual({ PATH: "/bin", HOME: "/home/test" });
    expect(snapshot).not.toBe(source);
    expect(Object.keys(snapshot)).not.toContain("EMPTY");
  });

  it("overlays overrides without touching the base", () => {
    const base: NodeJS.ProcessEnv = { PATH: "/bin", MODE: "base" };

    const result = overlayEnvironment({ MODE: "child", EXTRA: "1" }, { base });

    expect(result).toEqual({ PATH: "/bin", MODE: "child", EXTRA: "1" });
    expect(base).toEqual({ PATH: "/bin", MODE: "base" });
  });

  it("prepends an entry to a separated list without duplicating it", () => {
    expect(prependPathList(undefined, "/lib/a.so", ":")).toBe("/lib/a.so");
    expect(prependPathList("  ", "/lib/a.so", ":")).toBe("/lib/a.so");
    expect(prependPathList("/lib/b.so", "/lib/a.so", ":")).toBe(
      "/lib/a.so:/lib/b.so",
    );
    expect(prependPathList("/lib/b.so:/lib/a.so", "/lib/a.so", ":")).toBe(
      "/lib/a.so:/lib/b.so",
    );
  });

  it("recognises enabled flag spellings", () => {
    expect(isEnabledFlag("1")).toBe(true);
    expect(isEnabledFlag(" TRUE ")).toBe(true);
    expect(isEnabledFlag("yes")).toBe(true);
    expect(isEnabledFlag("0")).toBe(false);
    expect(isEnabledFlag(undefined)).toBe(false);
  });
});
