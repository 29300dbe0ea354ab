import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  AddNodeRequestSchema,
  jobKey,
  JobStatusQuerySchema,
  LogsQuerySchema,
  RemoveNodeRequestSchema,
} from "@scale-api/shared";
import type { Job } from "@scale-api/shared";

import {
  InventoryResponseSchema,
  JobAcceptedResponseSchema,
  JobIdParamsSchema,
  JobResponseSchema,
  ListJobsResponseSchema,
  LogsResponseSchema,
  SyncInventoryResponseSchema,
} from "./nodes.dtos";
import { CloudApiError } from "./hetznerCloudClient";
import { InventoryReadError, InventoryWriteError } from "./inventoryStore";
import type { InventoryStore } from "./inventoryStore";
import { JobNotFoundError } from "./jobStore";
import type { InventorySync } from "./inventorySync";
import type { JobStore } from "./jobStore";
import { LogsUnavailableError, tailLogFile } from "./logTail";
import { JobAlreadyActiveError } from "./nodeOrchestrator";
import type { NodeOrchestrator } from "./nodeOrchestrator";

// Shared error -> HTTP mapping. Anything unrecognised goes to Fastify's error handler.
function sendKnownError(err: unknown, reply: FastifyReply) {
  if (err instanceof z.ZodError) {
    return reply.code(400).send({ error: "bad_request", issues: err.issues });
  }
  if (err instanceof JobAlreadyActiveError) {
    return reply.code(409).send({ error: "already_active", message: err.message, job: err.job });
  }
  if (err instanceof JobNotFoundError) {
    return reply.code(404).send({ error: "job_not_found", message: err.message });
  }
  if (err instanceof InventoryReadError) {
    return reply.code(500).send({ error: "inventory_unreadable", message: err.message });
  }
  if (err instanceof InventoryWriteError) {
    return reply.code(500).send({ error: "inventory_write_failure", message: err.message });
  }
  if (err instanceof CloudApiError) {
    return reply.code(502).send({ error: "cloud_api_failure", message: err.message });
  }
  if (err instanceof LogsUnavailableError) {
    return reply.code(404).send({ error: "logs_unavailable", message: err.message });
  }
  throw err;
}

function accepted(job: Job) {
  return JobAcceptedResponseSchema.parse({
    job_id: job.job_id,
    status: job.status,
    message: job.message,
    job,
  });
}

export function createNodesController(deps: {
  orchestrator: NodeOrchestrator;
  jobs: JobStore;
  inventory: InventoryStore;
  sync?: InventorySync;
  logFile?: string;
}) {
  const { orchestrator, jobs, inventory, sync, logFile } = deps;

  return {
    async health(_request: FastifyRequest, reply: FastifyReply) {
      return reply.send({ status: "healthy", timestamp: new Date().toISOString() });
    },

    async addNode(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = AddNodeRequestSchema.parse(request.body);
        const job = orchestrator.submitAdd(input);
        return reply.code(202).send(accepted(job));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async removeNode(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = RemoveNodeRequestSchema.parse(request.query);
        const job = orchestrator.submitRemove({
          hostname: input.hostname,
          ip: input.ip,
          skipClusterRemoval: input.skip_k8s,
        });
        return reply.code(202).send(accepted(job));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async getStatus(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { hostname, ip, kind } = JobStatusQuerySchema.parse(request.query);
        const job = jobs.get(jobKey(kind, hostname, ip));
        return reply.send(JobResponseSchema.parse({ job }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async getJob(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { jobId } = JobIdParamsSchema.parse(request.params);
        return reply.send(JobResponseSchema.parse({ job: jobs.get(jobId) }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async listJobs(_request: FastifyRequest, reply: FastifyReply) {
      const list = jobs.list();
      return reply.send(ListJobsResponseSchema.parse({ total: list.length, jobs: list }));
    },

    async getInventory(_request: FastifyRequest, reply: FastifyReply) {
      try {
        const summary = await inventory.summary();
        return reply.send(InventoryResponseSchema.parse(summary));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async syncInventory(_request: FastifyRequest, reply: FastifyReply) {
      if (!sync) {
        return reply.code(400).send({
          error: "sync_not_configured",
          message: "Cloud inventory sync is disabled; set HCLOUD_TOKEN to enable it.",
        });
      }
      try {
        const { backupPath, ...changes } = await sync.run();
        return reply.send(SyncInventoryResponseSchema.parse({ status: "ok", ...changes, backup_path: backupPath }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },

    async getLogs(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { lines } = LogsQuerySchema.parse(request.query);
        const tail = await tailLogFile(logFile, lines);
        return reply.send(LogsResponseSchema.parse({ file: logFile, lines: tail }));
      } catch (err) {
        return sendKnownError(err, reply);
      }
    },
  };
}
