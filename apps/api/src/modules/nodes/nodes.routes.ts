import type { FastifyInstance } from "fastify";
import type { InventoryStore } from "./inventoryStore";
import type { InventorySync } from "./inventorySync";
import type { JobStore } from "./jobStore";
import type { NodeOrchestrator } from "./nodeOrchestrator";
import { createNodesController } from "./nodes.controller";

export function registerNodesRoutes(
  app: FastifyInstance,
  deps: {
    orchestrator: NodeOrchestrator;
    jobs: JobStore;
    inventory: InventoryStore;
    sync?: InventorySync;
    logFile?: string;
  }
) {
  const controller = createNodesController(deps);

  app.get("/health", controller.health); // Liveness only, no dependency checks.

  app.post("/add-node", controller.addNode); // Queues an add job for { hostname, ip }.
  app.delete("/remove-node", controller.removeNode); // Queues a remove job: ?hostname&ip&skip_k8s
  app.get("/status", controller.getStatus); // Job lookup by ?hostname&ip&kind

  app.get("/jobs", controller.listJobs); // All jobs in creation order.
  app.get("/jobs/:jobId", controller.getJob);

  app.get("/inventory", controller.getInventory); // Parsed hosts.yaml plus group counts.
  app.post("/sync-inventory", controller.syncInventory); // Pull autoscaled servers from the cloud provider.
  app.get("/logs", controller.getLogs); // Tail of LOG_FILE: ?lines
}
