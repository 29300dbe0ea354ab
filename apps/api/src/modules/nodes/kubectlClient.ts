import { z } from "zod";
import type { StepOutcome } from "@scale-api/shared";

import {
  ExecutorFailureError,
  ExecutorTimeoutError,
  timeoutOutput,
  toCommandOutput,
} from "./commandRunner";
import type { CommandResult, CommandRunner } from "./commandRunner";

type KubectlClientOptions = {
  runner: CommandRunner;
  kubectlBin?: string;
  kubeconfig?: string;
  /** Bound for get/delete calls. */
  timeoutMs: number;
  /** Bound handed to `kubectl drain --timeout`; the process itself gets a little extra. */
  drainTimeoutMs: number;
};

export type NodeLookup =
  | { found: false }
  | { found: true; ready: boolean; condition?: string };

// Only the fields needed to read the Ready condition.
const NodeConditionsSchema = z.object({
  status: z
    .object({
      conditions: z
        .array(z.object({ type: z.string(), status: z.string() }))
        .default([]),
    })
    .default({ conditions: [] }),
});

// Only the API server's answer for a missing node. Client-side errors such as
// `error: context "prod" not found` are faults, not absence.
const NODE_NOT_FOUND_PATTERN = /^Error from server \(NotFound\): nodes? "[^"]*" not found/m;
const DRAIN_PROCESS_GRACE_MS = 30_000;

function toSeconds(ms: number): number {
  return Math.max(1, Math.ceil(ms / 1000));
}

export class KubectlClient {
  private readonly runner: CommandRunner;
  private readonly kubectlBin: string;
  private readonly kubeconfig?: string;
  private readonly timeoutMs: number;
  private readonly drainTimeoutMs: number;

  constructor(opts: KubectlClientOptions) {
    this.runner = opts.runner;
    this.kubectlBin = opts.kubectlBin ?? "kubectl";
    this.kubeconfig = opts.kubeconfig;
    this.timeoutMs = opts.timeoutMs;
    this.drainTimeoutMs = opts.drainTimeoutMs;
  }

  /**
   * Looks the node up in the cluster. A NotFound answer is a normal result; any other
   * failure (API unreachable, bad credentials) is thrown as ExecutorFailureError.
   * Timeouts propagate as ExecutorTimeoutError.
   */
  async getNode(hostname: string): Promise<NodeLookup> {
    const result = await this.kubectl(["get", "node", hostname, "-o", "json"], this.timeoutMs);

    if (result.exitCode !== 0) {
      if (NODE_NOT_FOUND_PATTERN.test(result.stderr)) {
        return { found: false };
      }
      throw new ExecutorFailureError(
        `kubectl get node ${hostname} failed with exit code ${result.exitCode}: ${result.stderr.trim()}`,
        result
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(result.stdout);
    } catch {
      throw new ExecutorFailureError(`kubectl get node ${hostname} returned non-JSON output`, result);
    }

    const parsed = NodeConditionsSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExecutorFailureError(`kubectl get node ${hostname} returned an unexpected document`, result);
    }

    const ready = parsed.data.status.conditions.find((c) => c.type === "Ready");
    return { found: true, ready: ready?.status === "True", condition: ready?.status };
  }

  async drainNode(hostname: string): Promise<StepOutcome> {
    return this.step(
      [
        "drain",
        hostname,
        "--ignore-daemonsets",
        "--delete-emptydir-data",
        "--force",
        `--timeout=${toSeconds(this.drainTimeoutMs)}s`,
      ],
      this.drainTimeoutMs + DRAIN_PROCESS_GRACE_MS
    );
  }

  async deleteNode(hostname: string): Promise<StepOutcome> {
    return this.step(
      ["delete", "node", hostname, `--timeout=${toSeconds(this.timeoutMs)}s`],
      this.timeoutMs
    );
  }

  // Mutating steps never throw on a failed or hung command; the outcome carries the output.
  private async step(args: string[], timeoutMs: number): Promise<StepOutcome> {
    try {
      const result = await this.kubectl(args, timeoutMs);
      return { attempted: true, succeeded: result.exitCode === 0, output: toCommandOutput(result) };
    } catch (err) {
      if (err instanceof ExecutorTimeoutError) {
        return { attempted: true, succeeded: false, output: timeoutOutput(err) };
      }
      throw err;
    }
  }

  private kubectl(args: string[], timeoutMs: number): Promise<CommandResult> {
    const prefix = this.kubeconfig ? ["--kubeconfig", this.kubeconfig] : [];
    return this.runner.run(this.kubectlBin, [...prefix, ...args], { timeoutMs });
  }
}
