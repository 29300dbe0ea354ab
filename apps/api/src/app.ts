import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import type { AppConfig } from "./config";
import { AnsibleProvisioner } from "./modules/nodes/ansibleProvisioner";
import { ProcessCommandRunner } from "./modules/nodes/commandRunner";
import type { CommandRunner } from "./modules/nodes/commandRunner";
import { HetznerCloudClient } from "./modules/nodes/hetznerCloudClient";
import type { CloudServerSource } from "./modules/nodes/hetznerCloudClient";
import { InventoryStore } from "./modules/nodes/inventoryStore";
import { InventorySync } from "./modules/nodes/inventorySync";
import { JobStore } from "./modules/nodes/jobStore";
import { KubectlClient } from "./modules/nodes/kubectlClient";
import { NodeOrchestrator } from "./modules/nodes/nodeOrchestrator";
import { registerNodesRoutes } from "./modules/nodes/nodes.routes";
import { ReadinessPoller } from "./modules/nodes/readinessPoller";

export type BuiltApp = {
  app: FastifyInstance;
  orchestrator: NodeOrchestrator;
  jobs: JobStore;
  inventory: InventoryStore;
  sync?: InventorySync;
};

export type BuildAppOptions = {
  /** Replaces real process execution. */
  runner?: CommandRunner;
  /** Replaces the cloud API client when cloud sync is configured. */
  cloudSource?: CloudServerSource;
};

/** Wires the node lifecycle services into a Fastify instance. */
export function buildApp(config: AppConfig, opts: BuildAppOptions = {}): BuiltApp {
  const app = Fastify({
    logger: {
      level: config.logLevel,
      ...(config.logFile ? { file: config.logFile } : {}),
    },
  });

  const runner = opts.runner ?? new ProcessCommandRunner();
  const jobs = new JobStore();
  const inventory = new InventoryStore({
    inventoryPath: config.inventory.path,
    controlPlaneGroup: config.inventory.controlPlaneGroup,
    workerGroup: config.inventory.workerGroup,
    ansibleUser: config.inventory.ansibleUser,
    logger: app.log.child({ component: "inventory" }),
  });
  const provisioner = new AnsibleProvisioner({
    runner,
    inventoryPath: config.inventory.path,
    playbookBin: config.provisioning.playbookBin,
    playbook: config.provisioning.playbook,
    extraArgs: config.provisioning.extraArgs,
    timeoutMs: config.provisioning.timeoutMs,
  });
  const cluster = new KubectlClient({
    runner,
    kubectlBin: config.kubectl.bin,
    kubeconfig: config.kubectl.kubeconfig,
    timeoutMs: config.kubectl.timeoutMs,
    drainTimeoutMs: config.kubectl.drainTimeoutMs,
  });
  const orchestrator = new NodeOrchestrator({
    jobs,
    inventory,
    provisioner,
    cluster,
    poller: new ReadinessPoller(cluster, app.log.child({ component: "readiness" })),
    logger: app.log.child({ component: "orchestrator" }),
    policy: {
      verifyMaxAttempts: config.verification.maxAttempts,
      verifyIntervalMs: config.verification.intervalMs,
      deleteAfterFailedDrain: config.deleteAfterFailedDrain,
    },
  });

  let sync: InventorySync | undefined;
  if (config.cloudSync) {
    const syncLogger = app.log.child({ component: "inventory-sync" });
    sync = new InventorySync({
      source:
        opts.cloudSource ??
        new HetznerCloudClient({
          token: config.cloudSync.token,
          networkId: config.cloudSync.networkId,
          labelSelector: config.cloudSync.labelSelector,
          apiBaseUrl: config.cloudSync.apiBaseUrl,
          timeoutMs: config.cloudSync.timeoutMs,
          logger: syncLogger,
        }),
      inventory,
      jobs,
      logger: syncLogger,
      managedPrefix: config.cloudSync.managedPrefix,
    });
    if (config.cloudSync.intervalMs > 0) {
      sync.start(config.cloudSync.intervalMs);
    }
  }

  registerNodesRoutes(app, { orchestrator, jobs, inventory, sync, logFile: config.logFile });

  // Give running workflows a bounded window to record their outcome before the process goes away.
  app.addHook("onClose", async () => {
    sync?.stop();
    const settled = await orchestrator.whenIdle(config.shutdownGraceMs);
    if (!settled) {
      app.log.warn(
        { activeJobs: orchestrator.activeCount, graceMs: config.shutdownGraceMs },
        "closing with jobs still running"
      );
    }
  });

  return { app, orchestrator, jobs, inventory, sync };
}
