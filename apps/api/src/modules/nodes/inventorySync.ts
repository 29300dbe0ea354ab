import type { FastifyBaseLogger } from "fastify";
import { isActiveStatus } from "@scale-api/shared";

import type { CloudServerSource } from "./hetznerCloudClient";
import type { InventoryStore, SyncHostsResult } from "./inventoryStore";
import type { JobStore } from "./jobStore";

export type InventorySyncDeps = {
  source: CloudServerSource;
  inventory: InventoryStore;
  jobs: JobStore;
  logger: FastifyBaseLogger;
  managedPrefix: string;
};

/**
 * Pulls the autoscaled server list from the cloud provider into hosts.yaml.
 * Overlapping triggers (timer and HTTP) share one in-flight run. Hosts with an active
 * add/remove job are skipped so a sync never races a workflow on the same node.
 */
export class InventorySync {
  private readonly deps: InventorySyncDeps;
  private current?: Promise<SyncHostsResult>;
  private timer?: NodeJS.Timeout;

  constructor(deps: InventorySyncDeps) {
    this.deps = deps;
  }

  run(): Promise<SyncHostsResult> {
    if (!this.current) {
      this.current = this.sync().finally(() => {
        this.current = undefined;
      });
    }
    return this.current;
  }

  /** Runs a sync every `intervalMs` until `stop()`. Failures are logged; the next tick retries. */
  start(intervalMs: number): void {
    this.stop();
    this.timer = setInterval(() => {
      this.run().then(
        (result) => this.deps.logger.debug({ result }, "periodic inventory sync finished"),
        (err: unknown) => this.deps.logger.error({ err }, "periodic inventory sync failed")
      );
    }, intervalMs);
    this.timer.unref();
    this.deps.logger.info({ intervalMs }, "periodic inventory sync scheduled");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private async sync(): Promise<SyncHostsResult> {
    const servers = await this.deps.source.listServers();
    const busy = new Set(
      this.deps.jobs
        .list()
        .filter((job) => isActiveStatus(job.status))
        .map((job) => job.hostname)
    );
    return this.deps.inventory.syncHosts(servers, { managedPrefix: this.deps.managedPrefix, skip: busy });
  }
}
