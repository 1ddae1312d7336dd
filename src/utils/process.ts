import { spawn } from "node:child_process";
import { constants as osConstants } from "node:os";
import { PassThrough, type Writable } from "node:stream";

export class ProcessStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProcessStreamError";
  }
}

export interface SpawnStreamingProcessOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout: Writable;
  stderr: Writable;
}

export interface ProcessExit {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export async function spawnStreamingProcess(
  options: SpawnStreamingProcessOptions,
): Promise<ProcessExit> {
  const { command, args = [], cwd, env, stdout, stderr } = options;

  return await new Promise<ProcessExit>((resolve, reject) => {
    let resolved = false;

    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const childStdout = child.stdout;
    const childStderr = child.stderr;

    if (!childStdout || !childStderr) {
      void finalizeStreams([stdout, stderr]);
      reject(new ProcessStreamError("Failed to capture process output streams"));
      return;
    }

    childStdout.pipe(stdout, { end: false });
    childStderr.pipe(stderr, { end: false });

    const finalize = async (): Promise<void> => {
      childStdout.unpipe(stdout);
      childStderr.unpipe(stderr);
      await finalizeStreams([stdout, stderr]);
    };

    child.on("error", (error: Error) => {
      if (resolved) {
        return;
      }
      resolved = true;
      void finalize().finally(() => {
        reject(error);
      });
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (resolved) {
        return;
      }
      resolved = true;
      void finalize().finally(() => {
        resolve({ exitCode: code ?? 0, signal });
      });
    });
  });
}

export interface CapturedProcessResult extends ProcessExit {
  stdout: string;
  stderr: string;
}

export type CapturedProcessOptions = Omit<
  SpawnStreamingProcessOptions,
  "stdout" | "stderr"
>;

export async function runCapturedProcess(
  options: CapturedProcessOptions,
): Promise<CapturedProcessResult> {
  const stdoutTarget = new PassThrough();
  const stderrTarget = new PassThrough();
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  stdoutTarget.on("data", (chunk: Buffer) => {
    stdoutChunks.push(chunk);
  });
  stderrTarget.on("data", (chunk: Buffer) => {
    stderrChunks.push(chunk);
  });

  const exit = await spawnStreamingProcess({
    ...options,
    stdout: stdoutTarget,
    stderr: stderrTarget,
  });

  return {
    ...exit,
    stdout: Buffer.concat(stdoutChunks).toString("utf8"),
    stderr: Buffer.concat(stderrChunks).toString("utf8"),
  };
}

export interface SpawnInheritedProcessOptions {
  command: string;
  args?: readonly string[];
  cwd?: string;
  env: NodeJS.ProcessEnv;
  /** Signals relayed to the child while it runs. */
  forwardSignals?: readonly NodeJS.Signals[];
  /**
   * Signals the launcher absorbs while the child runs; the terminal already
   * delivers them to the whole foreground process group.
   */
  holdSignals?: readonly NodeJS.Signals[];
}

export const DEFAULT_FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGTERM",
  "SIGHUP",
];

export const DEFAULT_HELD_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGQUIT",
];

export async function spawnInheritedProcess(
  options: SpawnInheritedProcessOptions,
): Promise<ProcessExit> {
  const {
    command,
    args = [],
    cwd,
    env,
    forwardSignals = DEFAULT_FORWARDED_SIGNALS,
    holdSignals = DEFAULT_HELD_SIGNALS,
  } = options;

  return await new Promise<ProcessExit>((resolve, reject) => {
    let settled = false;
    const child = spawn(command, [...args], {
      cwd,
      env,
      stdio: "inherit",
    });

    const listeners = new Map<NodeJS.Signals, () => void>();
    for (const signal of forwardSignals) {
      listeners.set(signal, () => {
        child.kill(signal);
      });
    }
    for (const signal of holdSignals) {
      if (!listeners.has(signal)) {
        listeners.set(signal, () => {});
      }
    }
    for (const [signal, listener] of listeners) {
      process.on(signal, listener);
    }

    const release = (): void => {
      for (const [signal, listener] of listeners) {
        process.removeListener(signal, listener);
      }
    };

    child.once("error", (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      release();
      reject(error);
    });

    child.once(
      "exit",
      (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) {
          return;
        }
        settled = true;
        release();
        resolve({ exitCode: code ?? 0, signal });
      },
    );
  });
}

/**
 * Maps a child's termination to a shell-style status: its exit code, or
 * 128 plus the signal number when a signal ended it.
 */
export function toShellExitStatus(exit: ProcessExit): number {
  if (exit.signal) {
    const signalNumber: number | undefined = osConstants.signals[exit.signal];
    return signalNumber === undefined ? 1 : 128 + signalNumber;
  }
  return exit.exitCode;
}

async function finalizeStreams(streams: Writable[]): Promise<void> {
  const closures = Array.from(new Set(streams), (stream) => {
    const closed = waitForWritableClosure(stream);
    stream.end();
    return closed;
  });
  await Promise.all(closures);
}

function waitForWritableClosure(stream: Writable): Promise<void> {
  if (
    stream.destroyed ||
    stream.writableFinished ||
    stream.writableEnded ||
    stream.closed
  ) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const handleComplete = (): void => {
      stream.removeListener("close", handleComplete);
      stream.removeListener("finish", handleComplete);
      stream.removeListener("error", handleComplete);
      resolve();
    };

    stream.once("close", handleComplete);
    stream.once("finish", handleComplete);
    stream.once("error", handleComplete);
  });
}
