import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import Fastify from "fastify";

import type { CommandResult, CommandRunner, RunOptions } from "../../src/modules/nodes/commandRunner";

// No-op logger with the full FastifyBaseLogger surface.
export const testLogger = Fastify({ logger: false }).log;

export const INVENTORY_YAML = `all:
  hosts:
    m1:
      ansible_host: 10.0.0.1
      ip: 10.0.0.1
      access_ip: 10.0.0.1
    w2:
      ansible_host: 10.0.0.6
      ip: 10.0.0.6
      access_ip: 10.0.0.6
  children:
    kube_control_plane:
      hosts:
        m1:
    etcd:
      hosts:
        m1:
    kube_node:
      hosts:
        w2:
    k8s_cluster:
      children:
        kube_control_plane:
        kube_node:
  vars:
    ansible_user: root
`;

export async function makeInventoryDir(contents: string = INVENTORY_YAML) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "scale-api-"));
  const inventoryPath = path.join(dir, "hosts.yaml");
  await fs.writeFile(inventoryPath, contents, "utf8");
  return { dir, inventoryPath };
}

export async function listBackups(dir: string): Promise<string[]> {
  const names = await fs.readdir(dir);
  return names.filter((name) => name.startsWith("hosts.yaml.backup.")).sort();
}

export type RecordedCall = {
  command: string;
  args: string[];
  options: RunOptions;
};

type Handler = (command: string, args: string[], options: RunOptions) => CommandResult | Promise<CommandResult>;

/** In-process CommandRunner: records every call and answers from a handler. */
export class ScriptedRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: Handler) {}

  async run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    return this.handler(command, args, options);
  }
}

export function commandResult(
  command: string,
  args: string[],
  exitCode: number,
  stdout = "",
  stderr = ""
): CommandResult {
  return {
    command: [command, ...args].join(" "),
    exitCode,
    signal: null,
    stdout,
    stderr,
    durationMs: 12,
  };
}

export function nodeJson(ready: "True" | "False" | "Unknown"): string {
  return JSON.stringify({
    kind: "Node",
    metadata: { name: "w1" },
    status: {
      conditions: [
        { type: "MemoryPressure", status: "False" },
        { type: "Ready", status: ready },
      ],
    },
  });
}

export function notFoundStderr(hostname: string): string {
  return `Error from server (NotFound): nodes "${hostname}" not found\n`;
}

/** A promise the test resolves by hand, used to hold a workflow mid-flight. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
