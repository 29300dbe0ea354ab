import { z } from "zod";
import { JOB_ERROR_CODES, JOB_KINDS, JOB_STATUSES, REMOVE_JOB_PREFIX } from "../constants";

export const JobStatusSchema = z.enum(JOB_STATUSES);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const JobKindSchema = z.enum(JOB_KINDS);
export type JobKind = z.infer<typeof JobKindSchema>;

export const JobErrorCodeSchema = z.enum(JOB_ERROR_CODES);
export type JobErrorCode = z.infer<typeof JobErrorCodeSchema>;

const IsoDateSchema = z.iso.datetime();

// Captured result of one external command, kept verbatim for diagnosis.
export const CommandOutputSchema = z
  .object({
    command: z.string().min(1),
    exit_code: z.number().int().nullable(),
    stdout: z.string(),
    stderr: z.string(),
    duration_ms: z.number().int().nonnegative(),
    timed_out: z.boolean(),
  })
  .strict();

export type CommandOutput = z.infer<typeof CommandOutputSchema>;

export const ReadinessSnapshotSchema = z
  .object({
    found: z.boolean(),
    ready: z.boolean(),
    attempts: z.number().int().nonnegative(),
    condition: z.string().min(1).optional(),
    last_error: z.string().min(1).optional(),
    checked_at: IsoDateSchema,
  })
  .strict();

export type ReadinessSnapshot = z.infer<typeof ReadinessSnapshotSchema>;

export const StepOutcomeSchema = z
  .object({
    attempted: z.boolean(),
    succeeded: z.boolean(),
    output: CommandOutputSchema.optional(),
  })
  .strict();

export type StepOutcome = z.infer<typeof StepOutcomeSchema>;

// Per-step record of the cluster side of a removal. Steps are independent: a failed
// drain still leaves room for an attempted delete.
export const KubernetesRemovalSchema = z
  .object({
    skipped: z.boolean(),
    exists: z.boolean(),
    drained: z.boolean(),
    deleted: z.boolean(),
    drain: StepOutcomeSchema.optional(),
    delete: StepOutcomeSchema.optional(),
  })
  .strict();

export type KubernetesRemoval = z.infer<typeof KubernetesRemovalSchema>;

export const AddJobResultSchema = z
  .object({
    kind: z.literal("add"),
    inventory: z.enum(["added", "already_present"]),
    node_status: ReadinessSnapshotSchema.optional(),
  })
  .strict();

export type AddJobResult = z.infer<typeof AddJobResultSchema>;

export const RemoveJobResultSchema = z
  .object({
    kind: z.literal("remove"),
    kubernetes: KubernetesRemovalSchema,
    inventory: z.boolean(),
    inventory_error: z.string().min(1).optional(),
  })
  .strict();

export type RemoveJobResult = z.infer<typeof RemoveJobResultSchema>;

export const JobResultSchema = z.discriminatedUnion("kind", [AddJobResultSchema, RemoveJobResultSchema]);
export type JobResult = z.infer<typeof JobResultSchema>;

export const JobErrorSchema = z
  .object({
    code: JobErrorCodeSchema,
    message: z.string().min(1),
  })
  .strict();

export type JobError = z.infer<typeof JobErrorSchema>;

export const JobSchema = z
  .object({
    job_id: z.string().min(1),
    kind: JobKindSchema,
    hostname: z.string().min(1),
    ip: z.string().min(1).optional(),
    status: JobStatusSchema,
    message: z.string(),
    created_at: IsoDateSchema,
    started_at: IsoDateSchema.optional(),
    completed_at: IsoDateSchema.optional(),
    result: JobResultSchema.optional(),
    output: CommandOutputSchema.optional(),
    error: JobErrorSchema.optional(),
  })
  .strict();

export type Job = z.infer<typeof JobSchema>;

/**
 * Derives the deduplication key for a job. Add jobs are keyed by hostname and ip;
 * remove jobs carry a prefix and fall back to the bare hostname when no ip is given.
 */
export function jobKey(kind: JobKind, hostname: string, ip?: string): string {
  const base = ip ? `${hostname}_${ip}` : hostname;
  return kind === "remove" ? `${REMOVE_JOB_PREFIX}${base}` : base;
}

export function isActiveStatus(status: JobStatus): boolean {
  return status === "pending" || status === "running";
}
