import { setTimeout as sleep } from "node:timers/promises";
import type { FastifyBaseLogger } from "fastify";
import type { ReadinessSnapshot } from "@scale-api/shared";

import type { NodeLookup } from "./kubectlClient";

export type WaitReadyOptions = {
  maxAttempts: number;
  intervalMs: number;
};

/** Anything that can report whether a node has registered and is Ready. */
export interface NodeStatusSource {
  getNode(hostname: string): Promise<NodeLookup>;
}

export class ReadinessPoller {
  constructor(
    private readonly source: NodeStatusSource,
    private readonly logger: FastifyBaseLogger
  ) {}

  /**
   * Polls until the node reports Ready=True or `maxAttempts` lookups have been made.
   * Not-found, not-ready and failed lookups all keep polling; the returned snapshot
   * describes the last observation.
   */
  async waitReady(hostname: string, opts: WaitReadyOptions): Promise<ReadinessSnapshot> {
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let snapshot: ReadinessSnapshot = {
      found: false,
      ready: false,
      attempts: 0,
      checked_at: new Date().toISOString(),
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      snapshot = await this.observe(hostname, attempt);
      if (snapshot.ready) {
        this.logger.info({ hostname, attempts: attempt }, "node is ready");
        return snapshot;
      }

      this.logger.debug(
        { hostname, attempt, maxAttempts, found: snapshot.found, condition: snapshot.condition },
        "node not ready yet"
      );
      if (attempt < maxAttempts) {
        await sleep(opts.intervalMs);
      }
    }

    return snapshot;
  }

  private async observe(hostname: string, attempt: number): Promise<ReadinessSnapshot> {
    const checkedAt = new Date().toISOString();
    try {
      const lookup = await this.source.getNode(hostname);
      if (!lookup.found) {
        return { found: false, ready: false, attempts: attempt, checked_at: checkedAt };
      }
      return {
        found: true,
        ready: lookup.ready,
        attempts: attempt,
        ...(lookup.condition ? { condition: lookup.condition } : {}),
        checked_at: checkedAt,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ hostname, attempt, err: message }, "node status lookup failed");
      return { found: false, ready: false, attempts: attempt, last_error: message, checked_at: checkedAt };
    }
  }
}
