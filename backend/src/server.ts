import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadConfig } from "./config/env";
import { createApp } from "./index";
import { createLogger } from "./lib/logger";
import { createServices } from "./services";

const config = loadConfig(process.env);
const logger = createLogger(config.logLevel);
const app = createApp(createServices(config, logger), {
  version: config.version,
  corsOrigins: config.corsOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("Starting application", { port: info.port, version: config.version });
});

function shutdown(signal: string) {
  logger.info("Shutting down application", { signal });
  server.close((error) => {
    if (error) {
      logger.error("Shutdown failed", { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
