import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";

import type { CloudHost } from "./inventoryStore";

/** Anything that can list the servers the inventory should contain. */
export interface CloudServerSource {
  listServers(): Promise<CloudHost[]>;
}

export class CloudApiError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "CloudApiError";
  }
}

export type HetznerCloudClientOptions = {
  token: string;
  labelSelector: string;
  /** Private network whose address is preferred for each server. */
  networkId?: number;
  apiBaseUrl?: string;
  timeoutMs?: number;
  logger: FastifyBaseLogger;
  fetchImpl?: typeof fetch;
};

const PER_PAGE = 50;

const ServerSchema = z.looseObject({
  name: z.string().min(1),
  public_net: z
    .looseObject({
      ipv4: z.looseObject({ ip: z.string() }).nullish(),
    })
    .nullish(),
  private_net: z.array(z.looseObject({ network: z.number().int(), ip: z.string() })).default([]),
});

type Server = z.infer<typeof ServerSchema>;

const ServersPageSchema = z.looseObject({
  servers: z.array(ServerSchema),
  meta: z
    .looseObject({
      pagination: z.looseObject({ next_page: z.number().int().nullable() }),
    })
    .optional(),
});

type ServersPage = z.infer<typeof ServersPageSchema>;

export class HetznerCloudClient implements CloudServerSource {
  private readonly token: string;
  private readonly labelSelector: string;
  private readonly networkId?: number;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: FastifyBaseLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HetznerCloudClientOptions) {
    this.token = opts.token;
    this.labelSelector = opts.labelSelector;
    this.networkId = opts.networkId;
    this.apiBaseUrl = (opts.apiBaseUrl ?? "https://api.hetzner.cloud/v1").replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? globalThis.fetch;
  }

  /** All servers carrying the label selector, with the address Kubespray should use. */
  async listServers(): Promise<CloudHost[]> {
    const hosts: CloudHost[] = [];
    let page: number | null = 1;

    while (page !== null) {
      const body = await this.getPage(page);
      for (const server of body.servers) {
        const ip = this.serverIp(server);
        if (ip) {
          hosts.push({ name: server.name, ip });
        } else {
          this.logger.warn({ server: server.name }, "skipping server without a usable address");
        }
      }
      page = body.meta?.pagination.next_page ?? null;
    }

    this.logger.info({ count: hosts.length, labelSelector: this.labelSelector }, "listed cloud servers");
    return hosts;
  }

  // Configured private network first, then any private network, then public IPv4.
  private serverIp(server: Server): string | undefined {
    const preferred = server.private_net.find((net) => net.network === this.networkId);
    if (preferred) {
      return preferred.ip;
    }
    const firstPrivate = server.private_net[0];
    if (firstPrivate) {
      return firstPrivate.ip;
    }
    const publicIp = server.public_net?.ipv4?.ip;
    if (publicIp) {
      this.logger.warn({ server: server.name, ip: publicIp }, "no private address, using public IPv4");
    }
    return publicIp;
  }

  private async getPage(page: number): Promise<ServersPage> {
    const query = new URLSearchParams({
      label_selector: this.labelSelector,
      page: String(page),
      per_page: String(PER_PAGE),
    });
    const url = `${this.apiBaseUrl}/servers?${query.toString()}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${this.token}`, Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new CloudApiError(`Cloud API request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new CloudApiError(
        `Cloud API returned ${response.status}: ${body || response.statusText}`,
        response.status
      );
    }

    const json: unknown = await response.json().catch(() => undefined);
    const parsed = ServersPageSchema.safeParse(json);
    if (!parsed.success) {
      throw new CloudApiError("Cloud API returned an unexpected server list");
    }
    return parsed.data;
  }
}
