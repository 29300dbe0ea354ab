import { describe, expect, it } from "vitest";

import {
  ExecutorSpawnError,
  ExecutorTimeoutError,
  ProcessCommandRunner,
  timeoutOutput,
  toCommandOutput,
} from "../src/modules/nodes/commandRunner";

const node = process.execPath;

describe("ProcessCommandRunner", () => {
  const runner = new ProcessCommandRunner({ killGraceMs: 500 });

  it("captures stdout, stderr and a non-zero exit code", async () => {
    const script = "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)";
    const result = await runner.run(node, ["-e", script], { timeoutMs: 10_000 });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
    expect(result.command).toBe(`${node} -e ${script}`);
  });

  it("terminates a process that outlives its timeout", async () => {
    const script = "process.stdout.write('partial'); setTimeout(() => {}, 60000)";
    const startedAt = Date.now();

    const error = await runner.run(node, ["-e", script], { timeoutMs: 300 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutorTimeoutError);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
    if (error instanceof ExecutorTimeoutError) {
      expect(error.timeoutMs).toBe(300);
      expect(error.stdout).toBe("partial");
      const output = timeoutOutput(error);
      expect(output.timed_out).toBe(true);
      expect(output.exit_code).toBeNull();
    }
  });

  it("stops the whole process tree on timeout, including children that hold the output pipes", async () => {
    const script = [
      "const { spawn } = require('node:child_process');",
      "spawn(process.execPath, ['-e', 'setTimeout(() => {}, 8000)'], { stdio: 'inherit' });",
      "setTimeout(() => {}, 8000);",
    ].join(" ");
    const startedAt = Date.now();

    const error = await runner.run(node, ["-e", script], { timeoutMs: 300 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutorTimeoutError);
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it("requires a positive timeout", async () => {
    await expect(runner.run(node, ["-e", ""], { timeoutMs: 0 })).rejects.toBeInstanceOf(RangeError);
    await expect(runner.run(node, ["-e", ""], { timeoutMs: Number.NaN })).rejects.toBeInstanceOf(RangeError);
  });

  it("reports commands that cannot be started", async () => {
    await expect(
      runner.run("/nonexistent/scale-api/kubectl", ["version"], { timeoutMs: 1_000 })
    ).rejects.toBeInstanceOf(ExecutorSpawnError);
  });
});

describe("toCommandOutput", () => {
  it("maps a result into the job output shape", () => {
    expect(
      toCommandOutput({
        command: "kubectl get nodes",
        exitCode: 0,
        signal: null,
        stdout: "ok",
        stderr: "",
        durationMs: 12.6,
      })
    ).toEqual({
      command: "kubectl get nodes",
      exit_code: 0,
      stdout: "ok",
      stderr: "",
      duration_ms: 13,
      timed_out: false,
    });
  });
});
