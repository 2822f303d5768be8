// server.ts - Serve the profile application on Node.js

import { serve } from "@hono/node-server";
import { loadConfig } from "./lib/config.ts";
import { createApp } from "./lib/handler.ts";
import { InMemoryProfileRepository, loadSeedFile } from "./lib/profiles.ts";
import { log, setLogLevel } from "./lib/logger.ts";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const accounts = config.seedFile ? await loadSeedFile(config.seedFile) : [];
  const app = createApp({ repository: new InMemoryProfileRepository(accounts), config });

  const server = serve({ fetch: app.handle, port: config.port, hostname: config.host }, (info) => {
    log.info("Server listening", {
      address: info.address,
      port: info.port,
      mountPrefix: config.mountPrefix,
    });
  });

  const shutdown = (signal: string): void => {
    log.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        log.error("Error while closing server", {}, error);
        process.exitCode = 1;
      }
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Failed to start server", {}, error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
