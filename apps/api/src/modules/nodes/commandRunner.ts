import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import type { CommandOutput } from "@scale-api/shared";

export type RunOptions = {
  /** Hard limit; the process is terminated when it expires. */
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type CommandResult = {
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
};

/** Runs one external command to completion. Retry policy belongs to the caller. */
export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult>;
}

export class ExecutorTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
    readonly stdout: string,
    readonly stderr: string,
    readonly durationMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = "ExecutorTimeoutError";
  }
}

export class ExecutorSpawnError extends Error {
  constructor(
    readonly command: string,
    cause: unknown
  ) {
    super(`Failed to start ${command}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "ExecutorSpawnError";
  }
}

/** Raised by callers that treat a non-zero exit as a fault rather than an outcome. */
export class ExecutorFailureError extends Error {
  constructor(
    message: string,
    readonly result: CommandResult
  ) {
    super(message);
    this.name = "ExecutorFailureError";
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export function toCommandOutput(result: CommandResult): CommandOutput {
  return {
    command: result.command,
    exit_code: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    duration_ms: Math.round(result.durationMs),
    timed_out: false,
  };
}

export function timeoutOutput(err: ExecutorTimeoutError): CommandOutput {
  return {
    command: err.command,
    exit_code: null,
    stdout: err.stdout,
    stderr: err.stderr,
    duration_ms: Math.round(err.durationMs),
    timed_out: true,
  };
}

export type ProcessCommandRunnerOptions = {
  /** Time between SIGTERM and SIGKILL once a timeout fires. */
  killGraceMs?: number;
};

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ESRCH";
}

// The child leads its own process group, so ssh workers forked by ansible go down with it.
function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    if (!isNoSuchProcess(err)) {
      child.kill(signal);
    }
  }
}

export class ProcessCommandRunner implements CommandRunner {
  private readonly killGraceMs: number;

  constructor(opts: ProcessCommandRunnerOptions = {}) {
    this.killGraceMs = opts.killGraceMs ?? 5_000;
  }

  run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    const { timeoutMs } = options;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      return Promise.reject(new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`));
    }

    const display = formatCommand(command, args);
    const startedAt = performance.now();

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
        windowsHide: true,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let exited = false;
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      const finish = (): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        clearTimeout(timer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        return true;
      };

      // After a timeout the call settles on the child's exit or the SIGKILL deadline,
      // whichever comes first, even if a stray process still holds the pipes.
      const rejectTimedOut = () => {
        if (!finish()) {
          return;
        }
        child.stdout.destroy();
        child.stderr.destroy();
        const durationMs = performance.now() - startedAt;
        reject(
          new ExecutorTimeoutError(
            display,
            timeoutMs,
            Buffer.concat(stdout).toString("utf8"),
            Buffer.concat(stderr).toString("utf8"),
            durationMs
          )
        );
      };

      const timer = setTimeout(() => {
        timedOut = true;
        signalGroup(child, "SIGTERM");
        if (exited) {
          rejectTimedOut();
          return;
        }
        killTimer = setTimeout(() => {
          signalGroup(child, "SIGKILL");
          rejectTimedOut();
        }, this.killGraceMs);
      }, timeoutMs);

      child.once("error", (err) => {
        if (finish()) {
          reject(new ExecutorSpawnError(display, err));
        }
      });

      child.once("exit", () => {
        exited = true;
        if (timedOut) {
          rejectTimedOut();
        }
      });

      child.once("close", (code, signal) => {
        if (timedOut) {
          rejectTimedOut();
          return;
        }
        if (!finish()) {
          return;
        }
        resolve({
          command: display,
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          durationMs: performance.now() - startedAt,
        });
      });
    });
  }
}
