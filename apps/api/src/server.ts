import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { buildApp } from "./app";
import { loadConfig } from "./config";

loadDotenv({ path: resolve(__dirname, "../../../.env") });

async function start() {
  const config = loadConfig();
  const { app } = buildApp(config);

  app.log.info(
    { inventory: config.inventory.path, playbook: config.provisioning.playbook },
    "starting node lifecycle API"
  );

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: config.port, host: config.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
