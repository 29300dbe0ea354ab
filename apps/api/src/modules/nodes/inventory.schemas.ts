import { z } from "zod";

/**
 * Schemas for the Kubespray hosts.yaml document.
 * Only the parts this service reads or writes are typed; everything else is carried through
 * untouched so a rewrite never drops operator-maintained vars or groups.
 */

// Per-host connection vars (ansible_host, ip, access_ip, ...). Kubespray allows an empty entry.
export const HostVarsSchema = z.record(z.string(), z.unknown()).nullable();
export type HostVars = z.infer<typeof HostVarsSchema>;

// Group membership maps hostname -> null (or per-group overrides).
export const InventoryGroupSchema = z.looseObject({
  hosts: z.record(z.string(), z.unknown()).nullish(),
  children: z.record(z.string(), z.unknown()).nullish(),
});

export type InventoryGroup = z.infer<typeof InventoryGroupSchema>;

export const InventorySchema = z.looseObject({
  all: z.looseObject({
    hosts: z.record(z.string(), HostVarsSchema).nullish(),
    children: z.record(z.string(), InventoryGroupSchema.nullable()).nullish(),
    vars: z.record(z.string(), z.unknown()).nullish(),
  }),
});

export type Inventory = z.infer<typeof InventorySchema>;

export const InventoryStatsSchema = z
  .object({
    total_hosts: z.number().int().nonnegative(),
    control_plane: z.array(z.string()),
    workers: z.array(z.string()),
  })
  .strict();

export type InventoryStats = z.infer<typeof InventoryStatsSchema>;
