/**
 * Server entry point.
 *
 * Thin shell: context creation, session sweeper, startup and shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";

const ctx = createContext();
const { logger, sessionRepo } = ctx;

const app = createApp(ctx);

const sweeper = setInterval(() => {
  const removed = sessionRepo.sweepExpired();
  if (removed > 0) {
    logger.info({ removed, remaining: sessionRepo.size() }, "merge.sessions.swept");
  }
}, runtimeConfig.sessionSweepIntervalMs);
sweeper.unref();

const server = app.listen(runtimeConfig.port, runtimeConfig.host, () => {
  logger.info({ port: runtimeConfig.port, host: runtimeConfig.host, env: runtimeConfig.env }, "server.listening");
});

server.on("error", (error) => {
  logger.fatal({ err: error }, "server.start_failed");
  process.exit(1);
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, "Received termination signal, initiating graceful shutdown");
  clearInterval(sweeper);

  server.close(() => {
    logger.info("HTTP server closed, graceful shutdown complete");
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn("Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, 10_000).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
