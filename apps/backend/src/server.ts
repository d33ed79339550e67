/**
 * Emporium Backend Server (Entry Point)
 *
 * Thin shell: configuration, context creation, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { loadDotEnv, loadRuntimeConfig, type RuntimeConfig } from "./config";
import { createContext } from "./app/context";
import { createApp } from "./app/http";

loadDotEnv();

const loadConfigOrExit = (): RuntimeConfig => {
  try {
    return loadRuntimeConfig();
  } catch (error) {
    console.error(`[config] ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
};

const config = loadConfigOrExit();

const ctx = createContext(config);
const { logger, db } = ctx;

const app = createApp(ctx);

const server = app.listen(config.port, config.bindHost, () => {
  logger.info({ port: config.port, host: config.bindHost }, "Emporium backend listening");
});

const shutdown = () => {
  logger.info("Received termination signal, initiating graceful shutdown");

  // In-flight creation runs finish (or time out below); their transactions
  // commit or roll back on their own connections.
  server.close(() => {
    logger.info("HTTP server closed");
    db.close();
    logger.info("Database connection closed, graceful shutdown complete");
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn({ timeoutMs: config.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, config.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
