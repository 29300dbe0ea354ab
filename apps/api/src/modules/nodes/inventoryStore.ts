import type { FastifyBaseLogger } from "fastify";
import { parse, stringify } from "yaml";
import { DEFAULT_CONTROL_PLANE_GROUP, DEFAULT_WORKER_GROUP } from "@scale-api/shared";

import { createBackup, isMissingFileError, readText, writeTextAtomic } from "./fileStorage";
import { InventorySchema } from "./inventory.schemas";
import type { HostVars, Inventory, InventoryGroup, InventoryStats } from "./inventory.schemas";

/**
 * InventoryStore - typed access to the Kubespray hosts.yaml.
 *
 * Every mutation runs load -> backup -> atomic write inside one in-process lock, so two jobs
 * touching different hosts never interleave their read-modify-write cycles. Reads go straight
 * to disk; the atomic rename means they see either the old or the new document.
 */

export class ProtectedRoleError extends Error {
  constructor(
    readonly hostname: string,
    readonly group: string
  ) {
    super(`Refusing to modify ${hostname}: host is a member of the protected group ${group}`);
    this.name = "ProtectedRoleError";
  }
}

export class InventoryReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InventoryReadError";
  }
}

export class InventoryWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InventoryWriteError";
  }
}

export type AddHostResult = {
  status: "added" | "already_present";
  backupPath: string;
};

export type RemoveHostResult = {
  removed: boolean;
  backupPath?: string;
};

/** A host reported by the cloud provider. */
export type CloudHost = {
  name: string;
  ip: string;
};

export type SyncHostsOptions = {
  /** Only hosts whose name starts with this prefix are owned by the sync. */
  managedPrefix: string;
  /** Hosts left untouched this round, e.g. because a job is working on them. */
  skip?: ReadonlySet<string>;
};

export type SyncHostsResult = {
  added: string[];
  updated: string[];
  removed: string[];
  skipped: string[];
  backupPath?: string;
};

export type InventoryFileOps = {
  createBackup(filePath: string, now: Date): Promise<string>;
  writeTextAtomic(filePath: string, contents: string): Promise<void>;
};

export type InventorySummary = {
  stats: InventoryStats;
  inventory: Inventory;
};

export type InventoryStoreOptions = {
  inventoryPath: string;
  logger: FastifyBaseLogger;
  controlPlaneGroup?: string;
  workerGroup?: string;
  ansibleUser?: string;
  clock?: () => Date;
  fileOps?: InventoryFileOps;
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Direct members plus members of nested `children` groups, resolved through all.children.
function groupMembers(inventory: Inventory, group: string, seen: Set<string> = new Set()): string[] {
  if (seen.has(group)) {
    return [];
  }
  seen.add(group);

  const entry = inventory.all.children?.[group];
  const direct = Object.keys(entry?.hosts ?? {});
  const nested = Object.keys(entry?.children ?? {}).flatMap((child) => groupMembers(inventory, child, seen));
  return [...new Set([...direct, ...nested])];
}

function groupsContaining(inventory: Inventory, hostname: string): InventoryGroup[] {
  return Object.values(inventory.all.children ?? {}).filter(
    (group): group is InventoryGroup => Boolean(group?.hosts && Object.hasOwn(group.hosts, hostname))
  );
}

export class InventoryStore {
  readonly inventoryPath: string;
  readonly controlPlaneGroup: string;
  readonly workerGroup: string;
  private readonly ansibleUser?: string;
  private readonly logger: FastifyBaseLogger;
  private readonly clock: () => Date;
  private readonly fileOps: InventoryFileOps;
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: InventoryStoreOptions) {
    this.inventoryPath = opts.inventoryPath;
    this.controlPlaneGroup = opts.controlPlaneGroup ?? DEFAULT_CONTROL_PLANE_GROUP;
    this.workerGroup = opts.workerGroup ?? DEFAULT_WORKER_GROUP;
    this.ansibleUser = opts.ansibleUser;
    this.logger = opts.logger;
    this.clock = opts.clock ?? (() => new Date());
    this.fileOps = opts.fileOps ?? { createBackup, writeTextAtomic };
  }

  async load(): Promise<Inventory> {
    let raw: string;
    try {
      raw = await readText(this.inventoryPath);
    } catch (err) {
      throw new InventoryReadError(
        isMissingFileError(err)
          ? `Inventory file not found: ${this.inventoryPath}`
          : `Cannot read inventory ${this.inventoryPath}: ${describeError(err)}`
      );
    }

    let document: unknown;
    try {
      document = parse(raw);
    } catch (err) {
      throw new InventoryReadError(`Inventory ${this.inventoryPath} is not valid YAML: ${describeError(err)}`);
    }

    const parsed = InventorySchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new InventoryReadError(`Inventory ${this.inventoryPath} has an unexpected layout: ${issues.join("; ")}`);
    }
    return parsed.data;
  }

  async isControlPlane(hostname: string): Promise<boolean> {
    const inventory = await this.load();
    return groupMembers(inventory, this.controlPlaneGroup).includes(hostname);
  }

  async summary(): Promise<InventorySummary> {
    const inventory = await this.load();
    return {
      stats: {
        total_hosts: Object.keys(inventory.all.hosts ?? {}).length,
        control_plane: groupMembers(inventory, this.controlPlaneGroup),
        workers: groupMembers(inventory, this.workerGroup),
      },
      inventory,
    };
  }

  /**
   * Adds `hostname` to the worker group. A backup is taken even when the host is already
   * present; in that case the canonical file is left as it is.
   */
  async addHost(hostname: string, ip: string): Promise<AddHostResult> {
    return this.withLock(async () => {
      const inventory = await this.load();
      this.assertNotProtected(inventory, hostname);

      const backupPath = await this.backup();
      const hosts = inventory.all.hosts ?? {};
      const workers = this.ensureGroupHosts(inventory, this.workerGroup);

      if (Object.hasOwn(hosts, hostname) && Object.hasOwn(workers, hostname)) {
        this.logger.info({ hostname, backupPath }, "host already present in inventory");
        return { status: "already_present", backupPath };
      }

      if (!Object.hasOwn(hosts, hostname)) {
        hosts[hostname] = this.hostVars(ip);
      }
      inventory.all.hosts = hosts;
      workers[hostname] = null;

      await this.persist(inventory);
      this.logger.info({ hostname, ip, group: this.workerGroup, backupPath }, "added host to inventory");
      return { status: "added", backupPath };
    });
  }

  /**
   * Removes `hostname` from `all.hosts` and from every group. Absent hosts are a no-op
   * (`removed: false`, nothing written). Control-plane members are rejected before any write.
   */
  async removeHost(hostname: string): Promise<RemoveHostResult> {
    return this.withLock(async () => {
      const inventory = await this.load();
      this.assertNotProtected(inventory, hostname);

      const hosts = inventory.all.hosts ?? {};
      if (!Object.hasOwn(hosts, hostname) && groupsContaining(inventory, hostname).length === 0) {
        this.logger.warn({ hostname }, "host not found in inventory");
        return { removed: false };
      }

      const backupPath = await this.backup();
      this.dropHost(inventory, hostname);

      await this.persist(inventory);
      this.logger.info({ hostname, backupPath }, "removed host from inventory");
      return { removed: true, backupPath };
    });
  }

  /**
   * Reconciles the prefix-owned part of the inventory with the cloud provider's server list:
   * new servers join the worker group, changed addresses are rewritten and owned hosts the
   * provider no longer reports are dropped. Control-plane members and `skip` hosts are never
   * touched. Nothing is backed up or written when the document is already in sync.
   */
  async syncHosts(servers: CloudHost[], opts: SyncHostsOptions): Promise<SyncHostsResult> {
    return this.withLock(async () => {
      const inventory = await this.load();
      const protectedHosts = new Set(groupMembers(inventory, this.controlPlaneGroup));
      const hosts = inventory.all.hosts ?? {};
      inventory.all.hosts = hosts;
      const result: SyncHostsResult = { added: [], updated: [], removed: [], skipped: [] };

      const owned = (name: string): boolean => {
        if (!name.startsWith(opts.managedPrefix) || protectedHosts.has(name) || opts.skip?.has(name)) {
          result.skipped.push(name);
          return false;
        }
        return true;
      };

      const reported = new Set<string>();
      for (const server of servers) {
        reported.add(server.name);
        if (!owned(server.name)) {
          continue;
        }

        const workers = this.ensureGroupHosts(inventory, this.workerGroup);
        if (!Object.hasOwn(hosts, server.name)) {
          hosts[server.name] = this.hostVars(server.ip);
          workers[server.name] = null;
          result.added.push(server.name);
          continue;
        }

        const current = hosts[server.name];

        const moved = current?.ip !== server.ip || current?.ansible_host !== server.ip;
        if (moved) {
          hosts[server.name] = { ...(current ?? {}), ansible_host: server.ip, ip: server.ip, access_ip: server.ip };
        }
        const joined = !Object.hasOwn(workers, server.name);
        if (joined) {
          workers[server.name] = null;
        }
        if (moved || joined) {
          result.updated.push(server.name);
        }
      }

      for (const name of Object.keys(hosts)) {
        if (!reported.has(name) && name.startsWith(opts.managedPrefix) && owned(name)) {
          this.dropHost(inventory, name);
          result.removed.push(name);
        }
      }

      if (result.added.length + result.updated.length + result.removed.length === 0) {
        this.logger.info({ skipped: result.skipped }, "inventory already in sync with cloud provider");
        return result;
      }

      result.backupPath = await this.backup();
      await this.persist(inventory);
      this.logger.info(
        { added: result.added, updated: result.updated, removed: result.removed, backupPath: result.backupPath },
        "synced inventory with cloud provider"
      );
      return result;
    });
  }

  private dropHost(inventory: Inventory, hostname: string) {
    delete inventory.all.hosts?.[hostname];
    for (const group of groupsContaining(inventory, hostname)) {
      if (group.hosts) {
        delete group.hosts[hostname];
      }
    }
  }

  private assertNotProtected(inventory: Inventory, hostname: string) {
    if (groupMembers(inventory, this.controlPlaneGroup).includes(hostname)) {
      this.logger.error({ hostname, group: this.controlPlaneGroup }, "refusing to modify control-plane host");
      throw new ProtectedRoleError(hostname, this.controlPlaneGroup);
    }
  }

  private hostVars(ip: string): HostVars {
    return {
      ansible_host: ip,
      ip,
      access_ip: ip,
      ...(this.ansibleUser ? { ansible_user: this.ansibleUser } : {}),
    };
  }

  private ensureGroupHosts(inventory: Inventory, name: string): Record<string, unknown> {
    const children = inventory.all.children ?? {};
    inventory.all.children = children;
    const group: InventoryGroup = children[name] ?? {};
    children[name] = group;
    const hosts = group.hosts ?? {};
    group.hosts = hosts;
    return hosts;
  }

  private async backup(): Promise<string> {
    try {
      const backupPath = await this.fileOps.createBackup(this.inventoryPath, this.clock());
      this.logger.info({ backupPath }, "created inventory backup");
      return backupPath;
    } catch (err) {
      throw new InventoryWriteError(`Failed to back up inventory ${this.inventoryPath}: ${describeError(err)}`);
    }
  }

  private async persist(inventory: Inventory): Promise<void> {
    try {
      await this.fileOps.writeTextAtomic(this.inventoryPath, stringify(inventory));
    } catch (err) {
      throw new InventoryWriteError(`Failed to write inventory ${this.inventoryPath}: ${describeError(err)}`);
    }
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // The chain only orders mutations; each caller still sees its own rejection through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
