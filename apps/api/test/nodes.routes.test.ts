import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, describe, expect, it } from "vitest";

import { buildApp } from "../src/app";
import type { BuiltApp } from "../src/app";
import { loadConfig } from "../src/config";
import type { CommandResult } from "../src/modules/nodes/commandRunner";
import { CloudApiError } from "../src/modules/nodes/hetznerCloudClient";
import type { CloudServerSource } from "../src/modules/nodes/hetznerCloudClient";
import { commandResult, deferred, makeInventoryDir, nodeJson, ScriptedRunner } from "./helpers/fixtures";

let built: BuiltApp | undefined;

afterEach(async () => {
  await built?.app.close();
  built = undefined;
});

async function setup(
  opts: {
    provision?: () => Promise<CommandResult>;
    logFile?: string;
    env?: NodeJS.ProcessEnv;
    cloudSource?: CloudServerSource;
  } = {}
) {
  const { dir, inventoryPath } = await makeInventoryDir();
  const runner = new ScriptedRunner((command, args) => {
    if (command === "ansible-playbook") {
      return opts.provision ? opts.provision() : commandResult(command, args, 0);
    }
    return commandResult(command, args, 0, nodeJson("True"));
  });

  const config = loadConfig({
    INVENTORY_FILE: inventoryPath,
    LOG_LEVEL: "silent",
    LOG_FILE: opts.logFile,
    VERIFY_MAX_ATTEMPTS: "1",
    VERIFY_INTERVAL_MS: "0",
    ...opts.env,
  });
  built = buildApp(config, { runner, cloudSource: opts.cloudSource });
  return { dir, runner, ...built };
}

describe("nodes routes", () => {
  it("GET /health answers without touching dependencies", async () => {
    const { app, runner } = await setup();

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("healthy");
    expect(runner.calls).toHaveLength(0);
  });

  it("POST /add-node rejects a malformed body", async () => {
    const { app, jobs } = await setup();

    const res = await app.inject({ method: "POST", url: "/add-node", payload: { hostname: "--limit=all", ip: "10.0.0.5" } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("bad_request");
    expect(jobs.list()).toEqual([]);
  });

  it("POST /add-node rejects an invalid ip", async () => {
    const { app } = await setup();

    const res = await app.inject({ method: "POST", url: "/add-node", payload: { hostname: "w1", ip: "10.0.0.500" } });

    expect(res.statusCode).toBe(400);
  });

  it("POST /add-node accepts a job and GET /status reports its outcome", async () => {
    const { app, orchestrator } = await setup();

    const res = await app.inject({ method: "POST", url: "/add-node", payload: { hostname: "w1", ip: "10.0.0.5" } });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toMatchObject({ job_id: "w1_10.0.0.5", status: "pending" });

    await orchestrator.whenIdle();
    const status = await app.inject({ method: "GET", url: "/status?hostname=w1&ip=10.0.0.5" });
    expect(status.statusCode).toBe(200);
    expect(status.json().job).toMatchObject({
      job_id: "w1_10.0.0.5",
      kind: "add",
      status: "completed",
      message: "Node w1 joined the cluster and is Ready",
    });
  });

  it("POST /add-node answers 409 while the same node is already being added", async () => {
    const gate = deferred<CommandResult>();
    const { app, orchestrator } = await setup({ provision: () => gate.promise });
    const payload = { hostname: "w1", ip: "10.0.0.5" };

    const first = await app.inject({ method: "POST", url: "/add-node", payload });
    const second = await app.inject({ method: "POST", url: "/add-node", payload });

    expect(first.statusCode).toBe(202);
    expect(second.statusCode).toBe(409);
    expect(second.json().error).toBe("already_active");
    expect(second.json().job.job_id).toBe("w1_10.0.0.5");

    gate.resolve(commandResult("ansible-playbook", [], 0));
    await orchestrator.whenIdle();
  });

  it("GET /status and GET /jobs/:jobId answer 404 for unknown jobs", async () => {
    const { app } = await setup();

    const byQuery = await app.inject({ method: "GET", url: "/status?hostname=w9&ip=10.0.0.9" });
    const byId = await app.inject({ method: "GET", url: "/jobs/w9_10.0.0.9" });

    expect(byQuery.statusCode).toBe(404);
    expect(byQuery.json().error).toBe("job_not_found");
    expect(byId.statusCode).toBe(404);
  });

  it("DELETE /remove-node with skip_k8s only edits the inventory", async () => {
    const { app, orchestrator, runner } = await setup();

    const res = await app.inject({ method: "DELETE", url: "/remove-node?hostname=w2&skip_k8s=true" });

    expect(res.statusCode).toBe(202);
    expect(res.json().job_id).toBe("remove_w2");

    await orchestrator.whenIdle();
    const job = await app.inject({ method: "GET", url: "/jobs/remove_w2" });
    expect(job.json().job).toMatchObject({
      status: "completed",
      result: { kind: "remove", kubernetes: { skipped: true }, inventory: true },
    });
    expect(runner.calls).toHaveLength(0);

    const status = await app.inject({ method: "GET", url: "/status?hostname=w2&kind=remove" });
    expect(status.json().job.job_id).toBe("remove_w2");
  });

  it("GET /jobs lists jobs in creation order", async () => {
    const { app, orchestrator } = await setup();

    await app.inject({ method: "POST", url: "/add-node", payload: { hostname: "w1", ip: "10.0.0.5" } });
    await app.inject({ method: "DELETE", url: "/remove-node?hostname=w2&ip=10.0.0.6&skip_k8s=1" });
    await orchestrator.whenIdle();

    const res = await app.inject({ method: "GET", url: "/jobs" });
    expect(res.statusCode).toBe(200);
    expect(res.json().total).toBe(2);
    expect(res.json().jobs.map((job: { job_id: string }) => job.job_id)).toEqual(["w1_10.0.0.5", "remove_w2_10.0.0.6"]);
  });

  it("GET /inventory returns the parsed file with group stats", async () => {
    const { app } = await setup();

    const res = await app.inject({ method: "GET", url: "/inventory" });

    expect(res.statusCode).toBe(200);
    expect(res.json().stats).toEqual({ total_hosts: 2, control_plane: ["m1"], workers: ["w2"] });
    expect(res.json().inventory.all.vars).toEqual({ ansible_user: "root" });
  });

  it("GET /logs answers 404 when no log file is configured", async () => {
    const { app } = await setup();

    const res = await app.inject({ method: "GET", url: "/logs" });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe("logs_unavailable");
  });

  it("GET /logs returns the last lines of the log file", async () => {
    const { dir } = await makeInventoryDir();
    const logFile = path.join(dir, "service.log");
    await fs.writeFile(logFile, "first\nsecond\nthird\n", "utf8");
    const { app } = await setup({ logFile });

    const res = await app.inject({ method: "GET", url: "/logs?lines=2" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ file: logFile, lines: ["second", "third"] });
  });

  it("GET /logs rejects an out-of-range line count", async () => {
    const { app } = await setup();

    const res = await app.inject({ method: "GET", url: "/logs?lines=0" });

    expect(res.statusCode).toBe(400);
  });

  it("POST /sync-inventory answers 400 when cloud sync is not configured", async () => {
    const { app } = await setup();

    const res = await app.inject({ method: "POST", url: "/sync-inventory" });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("sync_not_configured");
  });

  it("POST /sync-inventory adds autoscaled servers to the worker group", async () => {
    const { app } = await setup({
      env: { HCLOUD_TOKEN: "test-token", CLOUD_SYNC_INTERVAL_MS: "0" },
      cloudSource: { listServers: async () => [{ name: "apps-7", ip: "10.0.1.7" }] },
    });

    const res = await app.inject({ method: "POST", url: "/sync-inventory" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "ok",
      added: ["apps-7"],
      updated: [],
      removed: [],
      skipped: [],
      backup_path: expect.stringMatching(/hosts\.yaml\.backup\.\d{8}T\d{9}Z$/),
    });
    const inventory = await app.inject({ method: "GET", url: "/inventory" });
    expect(inventory.json().stats.workers).toEqual(["w2", "apps-7"]);
  });

  it("POST /sync-inventory answers 502 when the cloud API fails", async () => {
    const { app } = await setup({
      env: { HCLOUD_TOKEN: "test-token", CLOUD_SYNC_INTERVAL_MS: "0" },
      cloudSource: {
        listServers: async () => {
          throw new CloudApiError("Cloud API returned 503: unavailable", 503);
        },
      },
    });

    const res = await app.inject({ method: "POST", url: "/sync-inventory" });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: "cloud_api_failure", message: "Cloud API returned 503: unavailable" });
  });

  it("closes within the shutdown grace period while a job is still running", async () => {
    const gate = deferred<CommandResult>();
    const { app, orchestrator } = await setup({ provision: () => gate.promise, env: { SHUTDOWN_GRACE_MS: "50" } });
    await app.inject({ method: "POST", url: "/add-node", payload: { hostname: "w1", ip: "10.0.0.5" } });

    const startedAt = Date.now();
    await app.close();
    built = undefined;

    expect(Date.now() - startedAt).toBeLessThan(2_000);
    expect(orchestrator.activeCount).toBe(1);

    gate.resolve(commandResult("ansible-playbook", [], 0));
    await orchestrator.whenIdle();
  });
});
