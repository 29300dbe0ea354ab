import { describe, expect, it } from "vitest";

import { ExecutorFailureError, ExecutorTimeoutError } from "../src/modules/nodes/commandRunner";
import { KubectlClient } from "../src/modules/nodes/kubectlClient";
import { commandResult, nodeJson, notFoundStderr, ScriptedRunner } from "./helpers/fixtures";

function client(runner: ScriptedRunner, kubeconfig?: string) {
  return new KubectlClient({ runner, kubeconfig, timeoutMs: 30_000, drainTimeoutMs: 120_000 });
}

describe("KubectlClient.getNode", () => {
  it("reports a NotFound answer as not found", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 1, "", notFoundStderr("w1")));
    expect(await client(runner).getNode("w1")).toEqual({ found: false });
  });

  it("treats a client-side 'not found' error as a failure", async () => {
    const runner = new ScriptedRunner((cmd, args) =>
      commandResult(cmd, args, 1, "", 'error: context "prod" not found\n')
    );
    await expect(client(runner).getNode("w2")).rejects.toBeInstanceOf(ExecutorFailureError);
  });

  it("reads the Ready condition", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 0, nodeJson("False")));
    expect(await client(runner).getNode("w1")).toEqual({ found: true, ready: false, condition: "False" });
  });

  it("treats a node without conditions as not ready", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 0, JSON.stringify({ kind: "Node" })));
    expect(await client(runner).getNode("w1")).toEqual({ found: true, ready: false, condition: undefined });
  });

  it("throws when the API cannot be reached", async () => {
    const runner = new ScriptedRunner((cmd, args) =>
      commandResult(cmd, args, 1, "", "The connection to the server 10.0.0.1:6443 was refused\n")
    );
    await expect(client(runner).getNode("w1")).rejects.toBeInstanceOf(ExecutorFailureError);
  });

  it("passes the kubeconfig ahead of the subcommand", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 0, nodeJson("True")));
    await client(runner, "/etc/kubernetes/admin.conf").getNode("w1");

    expect(runner.calls[0]?.command).toBe("kubectl");
    expect(runner.calls[0]?.args).toEqual([
      "--kubeconfig",
      "/etc/kubernetes/admin.conf",
      "get",
      "node",
      "w1",
      "-o",
      "json",
    ]);
    expect(runner.calls[0]?.options.timeoutMs).toBe(30_000);
  });
});

describe("KubectlClient drain/delete", () => {
  it("drains with eviction flags and a process bound above the drain timeout", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 0, "node/w1 drained\n"));
    const outcome = await client(runner).drainNode("w1");

    expect(outcome.attempted).toBe(true);
    expect(outcome.succeeded).toBe(true);
    expect(outcome.output?.stdout).toBe("node/w1 drained\n");
    expect(runner.calls[0]?.args).toEqual([
      "drain",
      "w1",
      "--ignore-daemonsets",
      "--delete-emptydir-data",
      "--force",
      "--timeout=120s",
    ]);
    expect(runner.calls[0]?.options.timeoutMs).toBe(150_000);
  });

  it("records a hung drain as a failed step instead of throwing", async () => {
    const runner = new ScriptedRunner(() => {
      throw new ExecutorTimeoutError("kubectl drain w1", 150_000, "evicting pod default/db-0\n", "", 150_000);
    });
    const outcome = await client(runner).drainNode("w1");

    expect(outcome).toEqual({
      attempted: true,
      succeeded: false,
      output: {
        command: "kubectl drain w1",
        exit_code: null,
        stdout: "evicting pod default/db-0\n",
        stderr: "",
        duration_ms: 150_000,
        timed_out: true,
      },
    });
  });

  it("records a failed delete with its exit code", async () => {
    const runner = new ScriptedRunner((cmd, args) => commandResult(cmd, args, 1, "", "error: forbidden\n"));
    const outcome = await client(runner).deleteNode("w1");

    expect(outcome.succeeded).toBe(false);
    expect(outcome.output?.exit_code).toBe(1);
    expect(runner.calls[0]?.args).toEqual(["delete", "node", "w1", "--timeout=30s"]);
  });
});
