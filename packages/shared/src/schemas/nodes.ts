import { z } from "zod";
import { DEFAULT_LOG_LINES, MAX_LOG_LINES } from "../constants";
import { JobKindSchema } from "./jobs";

// DNS-label style names only: keeps hostnames from being read as CLI flags by ansible/kubectl.
export const HostnameSchema = z
  .string()
  .trim()
  .min(1)
  .max(253)
  .regex(/^[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?$/, "invalid hostname");

export const NodeIpSchema = z.union([z.ipv4(), z.ipv6()]);

const BooleanFlagSchema = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0", "yes", "no"])])
  .transform((v) => v === true || v === "true" || v === "1" || v === "yes");

export const AddNodeRequestSchema = z
  .object({
    hostname: HostnameSchema,
    ip: NodeIpSchema,
  })
  .strict();

export type AddNodeRequest = z.infer<typeof AddNodeRequestSchema>;

export const RemoveNodeRequestSchema = z
  .object({
    hostname: HostnameSchema,
    ip: NodeIpSchema.optional(),
    skip_k8s: BooleanFlagSchema.default(false),
  })
  .strict();

export type RemoveNodeRequest = z.infer<typeof RemoveNodeRequestSchema>;

export const JobStatusQuerySchema = z
  .object({
    hostname: HostnameSchema,
    ip: NodeIpSchema.optional(),
    kind: JobKindSchema.default("add"),
  })
  .strict();

export type JobStatusQuery = z.infer<typeof JobStatusQuerySchema>;

export const LogsQuerySchema = z
  .object({
    lines: z.coerce.number().int().min(1).max(MAX_LOG_LINES).default(DEFAULT_LOG_LINES),
  })
  .strict();

export type LogsQuery = z.infer<typeof LogsQuerySchema>;
