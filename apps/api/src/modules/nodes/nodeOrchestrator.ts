import type { FastifyBaseLogger } from "fastify";
import type {
  AddJobResult,
  CommandOutput,
  Job,
  JobError,
  KubernetesRemoval,
  ReadinessSnapshot,
  RemoveJobResult,
  StepOutcome,
} from "@scale-api/shared";

import type { AnsibleProvisioner } from "./ansibleProvisioner";
import {
  ExecutorFailureError,
  ExecutorSpawnError,
  ExecutorTimeoutError,
  timeoutOutput,
  toCommandOutput,
} from "./commandRunner";
import type { InventoryStore } from "./inventoryStore";
import { InventoryReadError, InventoryWriteError, ProtectedRoleError } from "./inventoryStore";
import type { JobStore } from "./jobStore";
import type { KubectlClient } from "./kubectlClient";
import type { ReadinessPoller } from "./readinessPoller";

/**
 * NodeOrchestrator - runs add/remove workflows in the background.
 *
 * `submit*` registers the job and returns it while still pending; the workflow then runs on
 * its own promise and reports progress only through the JobStore. A workflow never rejects
 * to anyone: every failure ends up in the job's terminal record.
 */

export class JobAlreadyActiveError extends Error {
  constructor(readonly job: Job) {
    super(`A ${job.kind} job for ${job.hostname} is already ${job.status}: ${job.job_id}`);
    this.name = "JobAlreadyActiveError";
  }
}

export type OrchestratorPolicy = {
  verifyMaxAttempts: number;
  verifyIntervalMs: number;
  /**
   * Delete the node from the cluster even when the drain failed. Workloads that could not be
   * evicted are lost on deletion; turning this off leaves such nodes in place.
   */
  deleteAfterFailedDrain: boolean;
};

export type NodeOrchestratorDeps = {
  jobs: JobStore;
  inventory: InventoryStore;
  provisioner: AnsibleProvisioner;
  cluster: KubectlClient;
  poller: ReadinessPoller;
  logger: FastifyBaseLogger;
  policy: OrchestratorPolicy;
};

export type SubmitAddInput = {
  hostname: string;
  ip: string;
};

export type SubmitRemoveInput = {
  hostname: string;
  ip?: string;
  skipClusterRemoval?: boolean;
};

type Failure = {
  error: JobError;
  output?: CommandOutput;
};

const MESSAGE_TAIL_LINES = 5;

function lastLines(text: string, count: number): string {
  return text.trim().split("\n").slice(-count).join("\n");
}

// Maps a thrown error onto the job error taxonomy, keeping any captured command output.
function classifyFailure(err: unknown): Failure {
  if (err instanceof ProtectedRoleError) {
    return { error: { code: "protected_role", message: err.message } };
  }
  if (err instanceof InventoryWriteError) {
    return { error: { code: "inventory_write_failure", message: err.message } };
  }
  if (err instanceof InventoryReadError) {
    return { error: { code: "inventory_read_failure", message: err.message } };
  }
  if (err instanceof ExecutorTimeoutError) {
    return { error: { code: "executor_timeout", message: err.message }, output: timeoutOutput(err) };
  }
  if (err instanceof ExecutorFailureError) {
    return { error: { code: "executor_failure", message: err.message }, output: toCommandOutput(err.result) };
  }
  if (err instanceof ExecutorSpawnError) {
    return { error: { code: "executor_failure", message: err.message } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { error: { code: "internal", message: message || "Unexpected error" } };
}

function describeReadiness(hostname: string, snapshot: ReadinessSnapshot): string {
  if (!snapshot.found) {
    const cause = snapshot.last_error ? ` (last error: ${snapshot.last_error})` : "";
    return `Node ${hostname} was not found in the cluster after ${snapshot.attempts} checks${cause}`;
  }
  return `Node ${hostname} registered but is not Ready (Ready=${snapshot.condition ?? "Unknown"}) after ${snapshot.attempts} checks`;
}

function describeRemoval(hostname: string, result: RemoveJobResult): string {
  const { kubernetes } = result;
  let cluster: string;
  if (kubernetes.skipped) {
    cluster = "cluster removal skipped";
  } else if (!kubernetes.exists) {
    cluster = "node not found in cluster";
  } else {
    const deleteState = kubernetes.delete?.attempted ? (kubernetes.deleted ? "ok" : "failed") : "not attempted";
    cluster = `drain ${kubernetes.drained ? "ok" : "failed"}, delete ${deleteState}`;
  }

  const inventory = result.inventory_error
    ? `inventory update failed: ${result.inventory_error}`
    : result.inventory
      ? "removed from inventory"
      : "not present in inventory";

  return `Removal of ${hostname} finished: ${cluster}; ${inventory}`;
}

export class NodeOrchestrator {
  private readonly jobs: JobStore;
  private readonly inventory: InventoryStore;
  private readonly provisioner: AnsibleProvisioner;
  private readonly cluster: KubectlClient;
  private readonly poller: ReadinessPoller;
  private readonly logger: FastifyBaseLogger;
  private readonly policy: OrchestratorPolicy;
  private readonly inflight = new Set<Promise<void>>();

  constructor(deps: NodeOrchestratorDeps) {
    this.jobs = deps.jobs;
    this.inventory = deps.inventory;
    this.provisioner = deps.provisioner;
    this.cluster = deps.cluster;
    this.poller = deps.poller;
    this.logger = deps.logger;
    this.policy = deps.policy;
  }

  submitAdd(input: SubmitAddInput): Job {
    const outcome = this.jobs.tryCreate({
      kind: "add",
      hostname: input.hostname,
      ip: input.ip,
      message: `Node ${input.hostname} (${input.ip}) queued for addition`,
    });
    if (!outcome.created) {
      throw new JobAlreadyActiveError(outcome.job);
    }

    this.logger.info({ jobId: outcome.job.job_id, hostname: input.hostname, ip: input.ip }, "accepted add job");
    this.launch(outcome.job.job_id, () => this.runAdd(outcome.job.job_id, input));
    return outcome.job;
  }

  submitRemove(input: SubmitRemoveInput): Job {
    const outcome = this.jobs.tryCreate({
      kind: "remove",
      hostname: input.hostname,
      ip: input.ip,
      message: `Node ${input.hostname} queued for removal`,
    });
    if (!outcome.created) {
      throw new JobAlreadyActiveError(outcome.job);
    }

    this.logger.info(
      { jobId: outcome.job.job_id, hostname: input.hostname, skipClusterRemoval: Boolean(input.skipClusterRemoval) },
      "accepted remove job"
    );
    this.launch(outcome.job.job_id, () => this.runRemove(outcome.job.job_id, input));
    return outcome.job;
  }

  /**
   * Resolves once every workflow started so far (and any started meanwhile) has settled.
   * With `timeoutMs`, gives up after that long; the result says whether all work settled.
   */
  async whenIdle(timeoutMs?: number): Promise<boolean> {
    const drained = this.drain().then((): boolean => true);
    if (timeoutMs === undefined) {
      return drained;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([drained, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Number of workflows still running. */
  get activeCount(): number {
    return this.inflight.size;
  }

  private async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private launch(jobId: string, workflow: () => Promise<void>): void {
    const task: Promise<void> = Promise.resolve()
      .then(workflow)
      .catch((err: unknown) => this.fail(jobId, classifyFailure(err)))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private fail(jobId: string, failure: Failure, result?: Job["result"]): void {
    this.logger.error({ jobId, code: failure.error.code, err: failure.error.message }, "job failed");
    try {
      this.jobs.transition(jobId, {
        status: "failed",
        message: failure.error.message,
        error: failure.error,
        output: failure.output,
        result,
      });
    } catch (err) {
      this.logger.error({ jobId, err }, "could not record job failure");
    }
  }

  private async runAdd(jobId: string, input: SubmitAddInput): Promise<void> {
    const { hostname, ip } = input;
    this.jobs.transition(jobId, { status: "running", message: `Adding ${hostname} to inventory` });

    const added = await this.inventory.addHost(hostname, ip);
    const baseResult: AddJobResult = { kind: "add", inventory: added.status };

    this.jobs.note(jobId, `Running scale playbook limited to ${hostname}`);
    const provision = await this.provisioner.provision(hostname);
    const output = toCommandOutput(provision);

    if (provision.exitCode !== 0) {
      const detail = lastLines(provision.stderr || provision.stdout, MESSAGE_TAIL_LINES);
      const message = `Provisioning ${hostname} failed with exit code ${provision.exitCode}${detail ? `: ${detail}` : ""}`;
      this.fail(jobId, { error: { code: "executor_failure", message }, output }, baseResult);
      return;
    }

    this.logger.info({ jobId, hostname, durationMs: output.duration_ms }, "scale playbook finished");
    this.jobs.note(jobId, `Waiting for ${hostname} to become Ready`);
    const snapshot = await this.poller.waitReady(hostname, {
      maxAttempts: this.policy.verifyMaxAttempts,
      intervalMs: this.policy.verifyIntervalMs,
    });
    const result: AddJobResult = { ...baseResult, node_status: snapshot };

    if (!snapshot.ready) {
      const message = describeReadiness(hostname, snapshot);
      this.fail(jobId, { error: { code: "verification_timeout", message }, output }, result);
      return;
    }

    this.jobs.transition(jobId, {
      status: "completed",
      message: `Node ${hostname} joined the cluster and is Ready`,
      result,
      output,
    });
    this.logger.info({ jobId, hostname }, "add job completed");
  }

  private async runRemove(jobId: string, input: SubmitRemoveInput): Promise<void> {
    const { hostname } = input;
    this.jobs.transition(jobId, { status: "running", message: `Checking role of ${hostname}` });

    // Safety check before any cluster-side mutation.
    if (await this.inventory.isControlPlane(hostname)) {
      throw new ProtectedRoleError(hostname, this.inventory.controlPlaneGroup);
    }

    const kubernetes: KubernetesRemoval = input.skipClusterRemoval
      ? { skipped: true, exists: false, drained: false, deleted: false }
      : await this.removeFromCluster(jobId, hostname);

    this.jobs.note(jobId, `Removing ${hostname} from inventory`);
    const result: RemoveJobResult = { kind: "remove", kubernetes, inventory: false };
    try {
      result.inventory = (await this.inventory.removeHost(hostname)).removed;
    } catch (err) {
      if (!(err instanceof InventoryWriteError || err instanceof InventoryReadError)) {
        throw err;
      }
      this.logger.error({ jobId, hostname, err: err.message }, "inventory update failed during removal");
      result.inventory_error = err.message;
    }

    this.jobs.transition(jobId, {
      status: "completed",
      message: describeRemoval(hostname, result),
      result,
      output: kubernetes.delete?.output ?? kubernetes.drain?.output,
    });
    this.logger.info({ jobId, hostname, kubernetes, inventory: result.inventory }, "remove job completed");
  }

  private async removeFromCluster(jobId: string, hostname: string): Promise<KubernetesRemoval> {
    this.jobs.note(jobId, `Looking up ${hostname} in the cluster`);
    const lookup = await this.cluster.getNode(hostname);
    if (!lookup.found) {
      this.logger.info({ jobId, hostname }, "node not found in cluster, skipping drain and delete");
      return { skipped: false, exists: false, drained: false, deleted: false };
    }

    this.jobs.note(jobId, `Draining ${hostname}`);
    const drain = await this.cluster.drainNode(hostname);
    if (!drain.succeeded) {
      this.logger.warn({ jobId, hostname, exitCode: drain.output?.exit_code }, "drain did not complete");
    }

    let deletion: StepOutcome = { attempted: false, succeeded: false };
    if (drain.succeeded || this.policy.deleteAfterFailedDrain) {
      this.jobs.note(jobId, `Deleting ${hostname} from the cluster`);
      deletion = await this.cluster.deleteNode(hostname);
      if (!deletion.succeeded) {
        this.logger.warn({ jobId, hostname, exitCode: deletion.output?.exit_code }, "node delete failed");
      }
    } else {
      this.logger.warn({ jobId, hostname }, "drain failed and deleteAfterFailedDrain is off; node left in cluster");
    }

    return {
      skipped: false,
      exists: true,
      drained: drain.succeeded,
      deleted: deletion.succeeded,
      drain,
      delete: deletion,
    };
  }
}
