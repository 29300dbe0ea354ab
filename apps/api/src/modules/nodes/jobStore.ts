import { isActiveStatus, jobKey, JobSchema } from "@scale-api/shared";
import type { CommandOutput, Job, JobError, JobKind, JobResult, JobStatus } from "@scale-api/shared";

/**
 * JobStore - in-memory job table for the lifetime of the process.
 *
 * Keyed by job id (see `jobKey`). At most one pending/running job exists per key; a retry
 * after a terminal job replaces the old record and moves it to the end of the listing.
 * Every method is synchronous, so each call completes before any other workflow can observe
 * the table, and callers only ever receive copies.
 */

export class JobNotFoundError extends Error {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Invalid job status transition for ${jobId}: ${from} -> ${to}`);
    this.name = "InvalidJobTransitionError";
  }
}

export type CreateJobInput = {
  kind: JobKind;
  hostname: string;
  ip?: string;
  message?: string;
};

export type CreateJobOutcome = { created: true; job: Job } | { created: false; job: Job };

export type TransitionPatch = {
  status: JobStatus;
  message: string;
  result?: JobResult;
  output?: CommandOutput;
  error?: JobError;
};

const allowedTransitions: Record<JobStatus, JobStatus[]> = {
  pending: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

function assertCanMoveJob(jobId: string, from: JobStatus, to: JobStatus) {
  if (!allowedTransitions[from].includes(to)) {
    throw new InvalidJobTransitionError(jobId, from, to);
  }
}

export class JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly clock: () => Date;

  constructor(opts?: { clock?: () => Date }) {
    this.clock = opts?.clock ?? (() => new Date());
  }

  tryCreate(input: CreateJobInput): CreateJobOutcome {
    const jobId = jobKey(input.kind, input.hostname, input.ip);
    const existing = this.jobs.get(jobId);
    if (existing && isActiveStatus(existing.status)) {
      return { created: false, job: structuredClone(existing) };
    }

    const job: Job = JobSchema.parse({
      job_id: jobId,
      kind: input.kind,
      hostname: input.hostname,
      ip: input.ip,
      status: "pending",
      message: input.message ?? "Waiting to start",
      created_at: this.now(),
    });

    // Re-insert so listing order follows the creation of the current record.
    this.jobs.delete(jobId);
    this.jobs.set(jobId, job);
    return { created: true, job: structuredClone(job) };
  }

  transition(jobId: string, patch: TransitionPatch): Job {
    const current = this.require(jobId);
    assertCanMoveJob(jobId, current.status, patch.status);

    const now = this.now();
    const next: Job = JobSchema.parse({
      ...current,
      status: patch.status,
      message: patch.message,
      result: patch.result ?? current.result,
      output: patch.output ?? current.output,
      error: patch.status === "failed" ? patch.error : undefined,
      started_at: patch.status === "running" ? current.started_at ?? now : current.started_at,
      completed_at: patch.status === "completed" || patch.status === "failed" ? now : current.completed_at,
    });

    this.jobs.set(jobId, next);
    return structuredClone(next);
  }

  // Progress message on an active job; status is unchanged.
  note(jobId: string, message: string): Job {
    const current = this.require(jobId);
    if (!isActiveStatus(current.status)) {
      throw new InvalidJobTransitionError(jobId, current.status, current.status);
    }
    current.message = message;
    return structuredClone(current);
  }

  get(jobId: string): Job {
    return structuredClone(this.require(jobId));
  }

  find(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : undefined;
  }

  list(): Job[] {
    return [...this.jobs.values()].map((job) => structuredClone(job));
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private now() {
    return this.clock().toISOString();
  }
}
