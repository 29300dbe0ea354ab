// packages/shared/src/constants.ts

/** Job lifecycle: pending -> running -> completed | failed. */
export const JOB_STATUSES = ["pending", "running", "completed", "failed"] as const;

/** Statuses that block a second job for the same key. */
export const ACTIVE_JOB_STATUSES = ["pending", "running"] as const;

export const TERMINAL_JOB_STATUSES = ["completed", "failed"] as const;

export const JOB_KINDS = ["add", "remove"] as const;

/** Removal job ids carry this prefix so they never collide with add jobs for the same node. */
export const REMOVE_JOB_PREFIX = "remove_";

/** Failure codes recorded on a failed job. */
export const JOB_ERROR_CODES = [
  "protected_role",
  "executor_timeout",
  "executor_failure",
  "inventory_write_failure",
  "inventory_read_failure",
  "verification_timeout",
  "internal",
] as const;

/** Kubespray group names. */
export const DEFAULT_CONTROL_PLANE_GROUP = "kube_control_plane";
export const DEFAULT_WORKER_GROUP = "kube_node";

/** Bounds for GET /logs?lines=. */
export const DEFAULT_LOG_LINES = 100;
export const MAX_LOG_LINES = 5000;
