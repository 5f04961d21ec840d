/**
 * Merge Session Routes
 *
 * POST   /api/merge/sessions                        - Create a session from uploaded files
 * POST   /api/merge/sessions/:id/files              - Add files to a session
 * DELETE /api/merge/sessions/:id/files/:sourceId    - Remove one file
 * GET    /api/merge/sessions/:id                    - Session summary
 * DELETE /api/merge/sessions/:id                    - Discard a session
 * POST   /api/merge/sessions/:id/conflicts          - Resolve column collisions
 * POST   /api/merge/sessions/:id/reconcile          - Choose the merge strategy
 * POST   /api/merge/sessions/:id/merge              - Merge rows into the target schema
 * POST   /api/merge/sessions/:id/dedupe             - Apply a duplicate policy
 * POST   /api/merge/sessions/:id/export             - Download CSV or XLSX
 * GET    /api/merge/sessions/:id/preview/:stage     - First rows of a stage output
 * POST   /api/merge/sessions/:id/run                - Run every stage in order
 *
 * Files arrive base64 encoded inside the JSON body.
 */

import { Router, type Express, type Request, type Response } from "express";
import type { AppContext } from "../app/context";
import type { TabularDataset } from "../domain/dataset";
import { contentTypeFor, fileExtensionFor } from "../domain/formats";
import { MERGE_STAGE_NAMES, type MergeStageName } from "../domain/session";
import { previewDataset } from "../services/merge/preview";
import type { SessionOutcome } from "../services/mergeSessionService";
import {
  conflictsBodySchema,
  dedupeBodySchema,
  exportBodySchema,
  runBodySchema,
  sendValidationError,
  strategySchema,
  toLoadInput,
  uploadBodySchema,
  type UploadedFile,
} from "./requestSchemas";

const STATUS_BY_CODE: Record<string, number> = {
  LOAD_ERROR: 400,
  UNKNOWN_COLUMN: 400,
  AMBIGUOUS_CONFLICT: 422,
  EMPTY_INTERSECTION: 422,
  EMPTY_TEMPLATE: 422,
  EXPORT_ERROR: 422,
  SESSION_NOT_FOUND: 404,
  STAGE_NOT_READY: 409,
};

export function statusForCode(code: string): number {
  return STATUS_BY_CODE[code] ?? 500;
}

function isMergeStageName(value: string): value is MergeStageName {
  return MERGE_STAGE_NAMES.some((stage) => stage === value);
}

export function registerMergeSessionRoutes(app: Express, ctx: AppContext): void {
  const router = Router();
  const { logger, mergeSessions, config } = ctx;

  app.use("/api/merge/sessions", router);

  const previewOf = (previous: TabularDataset | TabularDataset[] | undefined) => {
    if (previous === undefined) return undefined;
    const datasets = Array.isArray(previous) ? previous : [previous];
    return datasets.map((d) => previewDataset(d, config.previewRowLimit));
  };

  /**
   * Send a stage failure with its HTTP status, or the success payload.
   */
  function respond<T>(res: Response, outcome: SessionOutcome<T>, body: (value: T) => object, status = 200): void {
    if (!outcome.ok) {
      res.status(statusForCode(outcome.error.code)).json({
        ok: false,
        sessionId: outcome.sessionId,
        error: outcome.error.code,
        message: outcome.error.message,
        ...(outcome.previous !== undefined ? { previous: previewOf(outcome.previous) } : {}),
      });
      return;
    }
    res.status(status).json({ ok: true, sessionId: outcome.sessionId, ...body(outcome.value) });
  }

  function oversized(files: readonly UploadedFile[]): UploadedFile | undefined {
    // base64 expands by 4/3
    return files.find((file) => Math.floor((file.content.length * 3) / 4) > config.maxUploadBytes);
  }

  function handleUpload(req: Request, res: Response, sessionId: string | undefined): void {
    const parsed = uploadBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const tooLarge = oversized(parsed.data.files);
    if (tooLarge) {
      res.status(413).json({
        ok: false,
        error: "PAYLOAD_TOO_LARGE",
        message: `File "${tooLarge.sourceId}" exceeds ${config.maxUploadBytes} bytes`,
      });
      return;
    }

    const outcome = mergeSessions.upload(sessionId, parsed.data.files.map(toLoadInput));
    respond(res, outcome, (value) => value, sessionId === undefined ? 201 : 200);
  }

  router.post("/", (req: Request, res: Response) => handleUpload(req, res, undefined));

  router.post("/:id/files", (req: Request, res: Response) => handleUpload(req, res, req.params.id));

  router.delete("/:id/files/:sourceId", (req: Request, res: Response) => {
    respond(res, mergeSessions.removeSource(req.params.id, req.params.sourceId), (summary) => ({ summary }));
  });

  router.get("/:id", (req: Request, res: Response) => {
    respond(res, mergeSessions.describe(req.params.id), (summary) => ({ summary }));
  });

  router.delete("/:id", (req: Request, res: Response) => {
    if (!mergeSessions.discard(req.params.id)) {
      res.status(404).json({ ok: false, error: "SESSION_NOT_FOUND", message: "Merge session not found" });
      return;
    }
    res.status(204).end();
  });

  router.post("/:id/conflicts", (req: Request, res: Response) => {
    const parsed = conflictsBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    respond(res, mergeSessions.resolveConflicts(req.params.id, parsed.data.policies), (value) => ({
      report: value.report,
      columns: value.datasets.map((d) => ({ sourceId: d.sourceId, columns: d.columns })),
    }));
  });

  router.post("/:id/reconcile", (req: Request, res: Response) => {
    const parsed = strategySchema.safeParse(req.body?.strategy);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    respond(res, mergeSessions.reconcile(req.params.id, parsed.data), (schema) => ({ schema }));
  });

  router.post("/:id/merge", (req: Request, res: Response) => {
    respond(res, mergeSessions.merge(req.params.id), (merged) => ({
      rows: merged.rows.length,
      preview: previewDataset(merged, config.previewRowLimit),
    }));
  });

  router.post("/:id/dedupe", (req: Request, res: Response) => {
    const parsed = dedupeBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    respond(res, mergeSessions.dedupe(req.params.id, parsed.data.policy, parsed.data.columns), (value) => ({
      report: value.report,
      preview: previewDataset(value.dataset, config.previewRowLimit),
    }));
  });

  router.post("/:id/export", (req: Request, res: Response) => {
    const parsed = exportBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const { format, materializeNulls, nullToken, fileName } = parsed.data;
    const outcome = mergeSessions.export(req.params.id, format, { materializeNulls, nullToken });
    if (!outcome.ok) return respond(res, outcome, () => ({}));

    const name = `${fileName ?? "merged"}.${fileExtensionFor(format)}`;
    logger.info({ sessionId: req.params.id, fileName: name, bytes: outcome.value.bytes.byteLength }, "merge.export.sent");
    res
      .status(200)
      .setHeader("Content-Type", contentTypeFor(format))
      .setHeader("Content-Disposition", `attachment; filename="${name.replace(/"/g, "")}"`)
      .send(outcome.value.bytes);
  });

  router.get("/:id/preview/:stage", (req: Request, res: Response) => {
    const { stage } = req.params;
    if (!isMergeStageName(stage)) {
      res.status(400).json({
        ok: false,
        error: "BAD_REQUEST",
        message: `Unknown stage "${stage}"; expected one of ${MERGE_STAGE_NAMES.join(", ")}`,
      });
      return;
    }
    respond(res, mergeSessions.preview(req.params.id, stage), (previews) => ({ stage, previews }));
  });

  router.post("/:id/run", (req: Request, res: Response) => {
    const parsed = runBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    respond(res, mergeSessions.runAll(req.params.id, parsed.data), (summary) => ({ summary }));
  });
}
