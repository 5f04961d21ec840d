/**
 * Listing Routes - card list enrichment and marketplace upload
 *
 * POST /api/listings/enrich       - Enrich a .csv/.txt card list into listing rows
 * GET  /api/listings/sets         - Sets available for whole-set listings
 * POST /api/listings/sets/:code   - Listing of every regular card in a set
 * POST /api/listings/upload       - Push a listing CSV to the store
 */

import { Router, type Express, type Request, type Response } from "express";
import { z } from "zod";
import type { AppContext } from "../app/context";
import { exportDataset } from "../services/merge/exporter";
import { loadDataset } from "../services/merge/datasetLoader";
import { previewDataset } from "../services/merge/preview";
import type { ListingOutcome } from "../services/listing/enrichmentService";
import { encodingSchema, sendValidationError, separatorSchema } from "./requestSchemas";

const enrichBodySchema = z.object({
  fileName: z.string().trim().min(1),
  content: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "content must be base64"),
  separator: separatorSchema.optional(),
  encoding: encodingSchema.optional(),
});

const uploadBodySchema = z.object({
  csvData: z.string().min(1),
});

const STATUS_BY_LISTING_ERROR: Record<string, number> = {
  LOAD_ERROR: 400,
  UNSUPPORTED_INPUT: 422,
  CATALOG_UNAVAILABLE: 502,
};

export function registerListingRoutes(app: Express, ctx: AppContext): void {
  const router = Router();
  const { logger, enrichment, uploader, config } = ctx;

  app.use("/api/listings", router);

  function sendListing(res: Response, outcome: ListingOutcome): void {
    if (!outcome.ok) {
      res.status(STATUS_BY_LISTING_ERROR[outcome.error] ?? 500).json(outcome);
      return;
    }

    const csv = exportDataset(
      outcome.dataset,
      { kind: "csv", separator: "comma", encoding: "utf-8" },
      { materializeNulls: true },
    );
    if (!csv.ok) {
      res.status(422).json({ ok: false, error: csv.error.code, message: csv.error.message });
      return;
    }

    res.json({
      ok: true,
      kind: outcome.kind,
      format: outcome.format,
      rate: outcome.rate,
      missing: outcome.missing,
      warnings: outcome.warnings,
      rows: outcome.dataset.rows.length,
      preview: previewDataset(outcome.dataset, config.previewRowLimit),
      csvData: csv.value.toString("utf8"),
    });
  }

  /**
   * POST /api/listings/enrich
   * Body: { fileName, content (base64), separator?, encoding? }
   */
  router.post("/enrich", async (req: Request, res: Response) => {
    const parsed = enrichBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const content = Buffer.from(parsed.data.content, "base64");
    if (content.byteLength > config.maxUploadBytes) {
      res.status(413).json({
        ok: false,
        error: "PAYLOAD_TOO_LARGE",
        message: `File exceeds ${config.maxUploadBytes} bytes`,
      });
      return;
    }

    logger.info({ fileName: parsed.data.fileName, bytes: content.byteLength }, "listing.enrich.start");
    try {
      sendListing(res, await enrichment.enrichUpload({ ...parsed.data, content }));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ err: error.message, fileName: parsed.data.fileName }, "listing.enrich.failed");
      res.status(500).json({ ok: false, error: "ENRICH_FAILED", message: error.message });
    }
  });

  router.get("/sets", async (_req: Request, res: Response) => {
    const sets = await enrichment.listSets();
    if (!sets) {
      res.status(502).json({ ok: false, error: "CATALOG_UNAVAILABLE", message: "Could not fetch sets" });
      return;
    }
    res.json({
      ok: true,
      sets: sets.map((set) => ({
        code: set.code,
        name: set.name,
        setType: set.set_type,
        releasedAt: set.released_at ?? null,
        label: `${set.name} (${set.code.toUpperCase()})`,
      })),
    });
  });

  router.post("/sets/:code", async (req: Request, res: Response) => {
    const code = req.params.code.trim();
    if (!/^[A-Za-z0-9]{2,8}$/.test(code)) {
      res.status(400).json({ ok: false, error: "BAD_REQUEST", message: `Invalid set code "${code}"` });
      return;
    }
    logger.info({ setCode: code }, "listing.set.start");
    sendListing(res, await enrichment.buildSetListing(code));
  });

  /**
   * POST /api/listings/upload
   * Body: { csvData: listing CSV text }
   */
  router.post("/upload", async (req: Request, res: Response) => {
    const parsed = uploadBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const loaded = loadDataset({
      sourceId: "listing.csv",
      content: Buffer.from(parsed.data.csvData, "utf8"),
      separator: "comma",
      encoding: "utf-8",
    });
    if (!loaded.ok) {
      res.status(400).json({ ok: false, error: loaded.error.code, message: loaded.error.message });
      return;
    }

    const outcome = await uploader.upload(loaded.value.dataset);
    if (!outcome.ok) {
      res.status(outcome.error === "MARKETPLACE_NOT_CONFIGURED" ? 503 : 422).json(outcome);
      return;
    }
    res.json(outcome);
  });
}
