import { spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import { resolvePreloadPlatform } from "../../src/launcher/platform.js";

jest.mock("node:child_process", () => ({
  spawn: jest.fn(),
}));
const spawnMock = jest.mocked(spawn);

describe("preload-launch entrypoint", () => {
  let runCli!: (argv?: readonly string[]) => Promise<void>;
  let stdout: string[];
  let stderr: string[];
  let stdoutSpy: jest.SpiedFunction<typeof process.stdout.write> | undefined;
  let stderrSpy: jest.SpiedFunction<typeof process.stderr.write> | undefined;
  let root: string;

  beforeAll(async () => {
    ({ runCli } = await import("../../src/bin.js"));
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    stdout = [];
    stderr = [];
    stdoutSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation((chunk: unknown) => {
        stdout.push(String(chunk));
        return true;
      });
    stderrSpy = jest
      .spyOn(process.stderr, "write")
      .mockImplementation((chunk: unknown) => {
        stderr.push(String(chunk));
        return true;
      });
    root = await mkdtemp(join(tmpdir(), "preload-cli-"));
  });

  afterEach(async () => {
    stdoutSpy?.mockRestore();
    stderrSpy?.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  it("prints usage without spawning when no arguments are given", async () => {
    await runCli(["node", "preload-launch"]);

    expect(stdout.join("")).toContain(
      "Usage: preload-launch [options] <script> <target> [args...]",
    );
    expect(spawnMock).not.toHaveBeenCalled();
    expect(process.exitCode ?? 0).toBe(0);
  });

  it("prints usage without spawning when only the script is given", async () => {
    await runCli(["node", "preload-launch", "trace.py"]);

    expect(stdout.join("")).toContain(
      "Usage: preload-launch [options] <script> <target> [args...]",
    );
    expect(spawnMock).not.toHaveBeenCalled();
    expect(process.exitCode ?? 0).toBe(0);
  });

  it("launches the target and adopts its exit status", async () => {
    const libraryPath = join(root, "libpreload_binding.so");
    const scriptPath = join(root, "trace.py");
    await writeFile(libraryPath, "");
    await writeFile(scriptPath, "");
    const fakeSpawn = (): EventEmitter => {
      const child = new EventEmitter();
      setImmediate(() => {
        child.emit("exit", 3, null);
      });
      return child;
    };
    spawnMock.mockImplementation(fakeSpawn as unknown as typeof spawn);

    await runCli([
      "node",
      "preload-launch",
      "--library",
      libraryPath,
      scriptPath,
      "/usr/bin/target",
      "--flag",
      "-x",
    ]);

    const preloadVariable = resolvePreloadPlatform().variable;
    expect(spawnMock).toHaveBeenCalledTimes(1);
    const [command, args, options] = spawnMock.mock.calls[0] ?? [];
    expect(command).toBe("/usr/bin/target");
    expect(args).toEqual(["--flag", "-x"]);
    expect(options).toMatchObject({
      stdio: "inherit",
      env: {
        [preloadVariable]: libraryPath,
        PRELOAD_LAUNCH_SCRIPT: scriptPath,
      },
    });
    expect(process.exitCode).toBe(3);
  });

  it("renders launch failures on stderr with exit code 1", async () => {
    await runCli([
      "node",
      "preload-launch",
      "--library",
      join(root, "libpreload_binding.so"),
      join(root, "missing.py"),
      "/usr/bin/target",
    ]);

    expect(spawnMock).not.toHaveBeenCalled();
    expect(stderr.join("")).toBe(
      `\u001B[31mError:\u001B[39m Instrumentation script not found: ${join(root, "missing.py")}\n`,
    );
    expect(process.exitCode).toBe(1);
  });

  it("renders configuration errors before launching", async () => {
    const configPath = join(root, "bad.yaml");
    await writeFile(configPath, "env:\n  preloadMode: sideways\n");
    await writeFile(join(root, "trace.py"), "");

    await runCli([
      "node",
      "preload-launch",
      "--config",
      configPath,
      join(root, "trace.py"),
      "/usr/bin/target",
    ]);

    expect(spawnMock).not.toHaveBeenCalled();
    expect(stderr.join("")).toContain(
      `Invalid launcher configuration (${configPath}): env.preloadMode:`,
    );
    expect(process.exitCode).toBe(1);
  });
});
