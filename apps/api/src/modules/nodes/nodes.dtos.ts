import { z } from "zod";
import { JobSchema, JobStatusSchema } from "@scale-api/shared";
import { InventorySchema, InventoryStatsSchema } from "./inventory.schemas";

// 202 body for accepted add/remove requests
export const JobAcceptedResponseSchema = z
  .object({
    job_id: z.string().min(1),
    status: JobStatusSchema,
    message: z.string(),
    job: JobSchema,
  })
  .strict();

export const JobResponseSchema = z.object({ job: JobSchema }).strict();

// Jobs in creation order
export const ListJobsResponseSchema = z
  .object({
    total: z.number().int().nonnegative(),
    jobs: z.array(JobSchema),
  })
  .strict();

export const JobIdParamsSchema = z.object({ jobId: z.string().min(1) }).strict();

export const InventoryResponseSchema = z
  .object({
    stats: InventoryStatsSchema,
    inventory: InventorySchema,
  })
  .strict();

export const SyncInventoryResponseSchema = z
  .object({
    status: z.literal("ok"),
    added: z.array(z.string()),
    updated: z.array(z.string()),
    removed: z.array(z.string()),
    skipped: z.array(z.string()),
    backup_path: z.string().optional(),
  })
  .strict();

export const LogsResponseSchema = z
  .object({
    file: z.string().min(1),
    lines: z.array(z.string()),
  })
  .strict();
