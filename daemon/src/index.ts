#!/usr/bin/env node
import Fastify from "fastify";
import { loadConfig } from "./config.js";
import { registerRoutes } from "./server.js";
import { createViewer } from "./viewer.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL ?? "info",
      transport:
        process.env.NODE_ENV !== "production"
          ? { target: "pino-pretty", options: { colorize: true } }
          : undefined,
    },
  });

  const log = app.log;

  // Initialize the core and its HTTP surface
  const viewer = createViewer(config, log);
  registerRoutes(app, viewer);

  // Startup
  await viewer.start();

  // Start listening
  await app.listen({ port: config.port, host: config.host });
  log.info(
    {
      port: config.port,
      host: config.host,
      sources: [...viewer.adapters.keys()],
    },
    "Log viewer daemon started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, "Shutting down...");
    await viewer.stop();
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err) => log.error({ err }, "Shutdown failed"));
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => log.error({ err }, "Shutdown failed"));
  });
}

main().catch((err) => {
  console.error("Fatal error starting daemon:", err);
  process.exit(1);
});
