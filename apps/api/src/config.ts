import { z } from "zod";
import { DEFAULT_CONTROL_PLANE_GROUP, DEFAULT_WORKER_GROUP } from "@scale-api/shared";

/**
 * Service configuration, read from the environment (after .env is loaded by the entrypoint).
 * Durations are milliseconds.
 */

const BooleanEnvSchema = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((v) => ["1", "true", "yes", "on"].includes(v));

const ListEnvSchema = z
  .string()
  .transform((v) => v.split(/\s+/).filter(Boolean));

const OptionalString = z
  .string()
  .trim()
  .transform((v) => v || undefined)
  .optional();

const PositiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: OptionalString,

  INVENTORY_FILE: z.string().min(1).default("/opt/kubespray/inventory/mycluster/hosts.yaml"),
  CONTROL_PLANE_GROUP: z.string().min(1).default(DEFAULT_CONTROL_PLANE_GROUP),
  WORKER_GROUP: z.string().min(1).default(DEFAULT_WORKER_GROUP),
  INVENTORY_ANSIBLE_USER: OptionalString,

  ANSIBLE_PLAYBOOK_BIN: z.string().min(1).default("ansible-playbook"),
  SCALE_PLAYBOOK: z.string().min(1).default("/opt/kubespray/scale.yml"),
  ANSIBLE_EXTRA_ARGS: ListEnvSchema.default([]),
  PROVISION_TIMEOUT_MS: PositiveInt.default(30 * 60_000),

  KUBECTL_BIN: z.string().min(1).default("kubectl"),
  KUBECONFIG: OptionalString,
  KUBECTL_TIMEOUT_MS: PositiveInt.default(30_000),
  DRAIN_TIMEOUT_MS: PositiveInt.default(5 * 60_000),

  VERIFY_MAX_ATTEMPTS: PositiveInt.default(30),
  VERIFY_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10_000),
  DELETE_AFTER_FAILED_DRAIN: BooleanEnvSchema.default(true),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(10_000),

  // Cloud inventory sync is enabled by HCLOUD_TOKEN.
  HCLOUD_TOKEN: OptionalString,
  HCLOUD_NETWORK: z.coerce.number().int().positive().optional(),
  HCLOUD_LABEL_SELECTOR: z.string().min(1).default("hcloud/node-group=apps"),
  HCLOUD_API_URL: z.url().default("https://api.hetzner.cloud/v1"),
  HCLOUD_TIMEOUT_MS: PositiveInt.default(30_000),
  CLOUD_SYNC_HOST_PREFIX: z.string().min(1).default("apps-"),
  CLOUD_SYNC_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10 * 60_000),
});

export type AppConfig = {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  logFile?: string;
  inventory: {
    path: string;
    controlPlaneGroup: string;
    workerGroup: string;
    ansibleUser?: string;
  };
  provisioning: {
    playbookBin: string;
    playbook: string;
    extraArgs: string[];
    timeoutMs: number;
  };
  kubectl: {
    bin: string;
    kubeconfig?: string;
    timeoutMs: number;
    drainTimeoutMs: number;
  };
  verification: {
    maxAttempts: number;
    intervalMs: number;
  };
  deleteAfterFailedDrain: boolean;
  /** How long shutdown waits for running jobs before closing anyway. */
  shutdownGraceMs: number;
  cloudSync?: {
    token: string;
    networkId?: number;
    labelSelector: string;
    apiBaseUrl: string;
    timeoutMs: number;
    managedPrefix: string;
    /** 0 disables the periodic sync; POST /sync-inventory still works. */
    intervalMs: number;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty variables count as unset so defaults apply.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.parse(present);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE,
    inventory: {
      path: parsed.INVENTORY_FILE,
      controlPlaneGroup: parsed.CONTROL_PLANE_GROUP,
      workerGroup: parsed.WORKER_GROUP,
      ansibleUser: parsed.INVENTORY_ANSIBLE_USER,
    },
    provisioning: {
      playbookBin: parsed.ANSIBLE_PLAYBOOK_BIN,
      playbook: parsed.SCALE_PLAYBOOK,
      extraArgs: parsed.ANSIBLE_EXTRA_ARGS,
      timeoutMs: parsed.PROVISION_TIMEOUT_MS,
    },
    kubectl: {
      bin: parsed.KUBECTL_BIN,
      kubeconfig: parsed.KUBECONFIG,
      timeoutMs: parsed.KUBECTL_TIMEOUT_MS,
      drainTimeoutMs: parsed.DRAIN_TIMEOUT_MS,
    },
    verification: {
      maxAttempts: parsed.VERIFY_MAX_ATTEMPTS,
      intervalMs: parsed.VERIFY_INTERVAL_MS,
    },
    deleteAfterFailedDrain: parsed.DELETE_AFTER_FAILED_DRAIN,
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
    cloudSync: parsed.HCLOUD_TOKEN
      ? {
          token: parsed.HCLOUD_TOKEN,
          networkId: parsed.HCLOUD_NETWORK,
          labelSelector: parsed.HCLOUD_LABEL_SELECTOR,
          apiBaseUrl: parsed.HCLOUD_API_URL,
          timeoutMs: parsed.HCLOUD_TIMEOUT_MS,
          managedPrefix: parsed.CLOUD_SYNC_HOST_PREFIX,
          intervalMs: parsed.CLOUD_SYNC_INTERVAL_MS,
        }
      : undefined,
  };
}
