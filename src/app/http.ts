/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";

import { registerListingRoutes } from "../routes/listings";
import { registerMergeSessionRoutes } from "../routes/mergeSessions";

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { logger, config } = ctx;

  // Uploads travel as base64 in JSON; leave room for several files per request
  app.use(express.json({ limit: config.maxUploadBytes * 4 }));

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      sessions: ctx.sessionRepo.size(),
      marketplaceConfigured: ctx.shopify.isConfigured(),
    });
  });

  registerMergeSessionRoutes(app, ctx);
  registerListingRoutes(app, ctx);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` });
  });

  // Body parser failures (malformed JSON, oversized body) and anything a handler threw
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      logger.error({ err: message, method: req.method, path: req.path }, "http.request.failed");
    }
    res.status(status).json({
      ok: false,
      error: status === 413 ? "PAYLOAD_TOO_LARGE" : status < 500 ? "BAD_REQUEST" : "INTERNAL_ERROR",
      message,
    });
  });

  return app;
}
