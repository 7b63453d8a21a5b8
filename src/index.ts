import "dotenv/config";
import { serve } from "@hono/node-server";
import { createAppContext } from "./app-context.js";
import { parseServiceConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createServiceLogger } from "./services/logger.js";
import { createApp } from "./server.js";
import type { ServiceConfig } from "./types/service-config.js";

function loadConfigOrExit(): ServiceConfig {
  try {
    return parseServiceConfig(process.env);
  } catch (error) {
    const logger = createServiceLogger("info");
    if (error instanceof ConfigurationError) {
      logger.fatal(`[triage] ${error.message}`);
    } else {
      logger.fatal(`[triage] startup failed: ${String(error)}`);
    }
    process.exit(1);
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = createServiceLogger(config.logLevel);
  const context = createAppContext(config, logger);
  const app = createApp(context);

  const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
    logger.info(`[triage] listening on http://${info.address}:${info.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`[triage] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
