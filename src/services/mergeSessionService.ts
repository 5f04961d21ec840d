import type { Logger } from "pino";
import type {
  ConflictPolicyMap,
  DuplicatePolicy,
  MergeStrategy,
  Schema,
  TabularDataset,
} from "../domain/dataset";
import type { MergeStageError } from "../domain/errors";
import type { ExportFormat, ExportOptions } from "../domain/formats";
import {
  SessionError,
  type MergeSession,
  type MergeSessionSummary,
  type MergeStageName,
} from "../domain/session";
import type { MergeSessionRepository } from "../repositories/mergeSessionRepository";
import { resolveConflicts, type ConflictReport } from "./merge/conflictResolver";
import { loadDatasets, type LoadInput, type LoadReport } from "./merge/datasetLoader";
import { dedupeRows, type DuplicateReport } from "./merge/duplicateResolver";
import { exportDataset } from "./merge/exporter";
import { previewDataset, type DatasetPreview } from "./merge/preview";
import { mergeRows } from "./merge/rowMerger";
import { reconcileSchema } from "./merge/schemaReconciler";

/**
 * Result of a session operation. Stage failures carry the unchanged input of
 * the failed stage so the caller can adjust options and retry.
 */
export type SessionOutcome<T> =
  | { ok: true; sessionId: string; value: T }
  | {
      ok: false;
      sessionId: string | null;
      error: MergeStageError | SessionError;
      previous?: TabularDataset | TabularDataset[];
    };

export interface RunAllOptions {
  conflicts?: ConflictPolicyMap;
  strategy: MergeStrategy;
  duplicatePolicy: DuplicatePolicy;
  comparisonColumns?: string[];
}

/**
 * MergeSessionService drives the merge pipeline for one session at a time:
 * - Creates the session on first upload and keeps the original sources
 * - Runs each stage on request, replacing that stage's output
 * - Clears later stage outputs when an earlier stage is re-run
 */
export class MergeSessionService {
  constructor(
    private readonly sessions: MergeSessionRepository,
    private readonly logger: Logger,
    private readonly previewRowLimit: number,
  ) {}

  /**
   * Load files into a session. Without a sessionId a new session is created,
   * but only once the files load.
   */
  upload(
    sessionId: string | undefined,
    inputs: readonly LoadInput[],
  ): SessionOutcome<{ reports: LoadReport[]; summary: MergeSessionSummary }> {
    let session: MergeSession | undefined;
    if (sessionId !== undefined) {
      session = this.sessions.get(sessionId);
      if (!session) return this.notFound(sessionId);
    }

    this.logger.info(
      {
        sessionId: sessionId ?? null,
        files: inputs.map((i) => ({ sourceId: i.sourceId, bytes: i.content.byteLength })),
      },
      "merge.upload.start",
    );

    const existing = new Set(session?.sources.map((s) => s.dataset.sourceId) ?? []);
    const clash = inputs.find((input) => existing.has(input.sourceId));
    if (clash) {
      return this.stageFailed(sessionId ?? null, "upload", {
        error: new SessionError(
          "STAGE_NOT_READY",
          `Source "${clash.sourceId}" is already loaded; remove it before uploading it again`,
        ),
      });
    }

    const loaded = loadDatasets(inputs);
    if (!loaded.ok) {
      return this.stageFailed(sessionId ?? null, "upload", { error: loaded.error });
    }

    session ??= this.sessions.create();
    session.sources = [...session.sources, ...loaded.value];
    this.invalidateFrom(session, "sources");

    const reports = loaded.value.map((source) => source.report);
    for (const report of reports) {
      if (report.malformedRows.length > 0) {
        this.logger.warn(
          {
            sessionId: session.id,
            sourceId: report.sourceId,
            malformed: report.malformedRows.length,
            firstRowIndex: report.malformedRows[0].rowIndex,
          },
          "merge.upload.malformed_rows",
        );
      }
    }
    this.logger.info(
      { sessionId: session.id, sources: session.sources.length, rows: reports.map((r) => r.rowCount) },
      "merge.upload.complete",
    );

    return { ok: true, sessionId: session.id, value: { reports, summary: this.summarize(session) } };
  }

  removeSource(sessionId: string, sourceId: string): SessionOutcome<MergeSessionSummary> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);

    const remaining = session.sources.filter((s) => s.dataset.sourceId !== sourceId);
    if (remaining.length === session.sources.length) {
      return this.stageFailed(sessionId, "remove_source", {
        error: new SessionError("STAGE_NOT_READY", `Source "${sourceId}" is not loaded`),
      });
    }
    session.sources = remaining;
    this.invalidateFrom(session, "sources");
    this.logger.info({ sessionId, sourceId }, "merge.source.removed");
    return { ok: true, sessionId, value: this.summarize(session) };
  }

  /**
   * Without policies the session's current ones are applied again.
   */
  resolveConflicts(
    sessionId: string,
    requested?: ConflictPolicyMap,
  ): SessionOutcome<{ datasets: TabularDataset[]; report: ConflictReport }> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);
    if (session.sources.length === 0) return this.notReady(sessionId, "resolve_conflicts", "No files uploaded");

    const policies = requested ?? session.conflictPolicies;
    const inputs = session.sources.map((s) => s.dataset);
    const result = resolveConflicts(inputs, policies);
    if (!result.ok) {
      return this.stageFailed(sessionId, "resolve_conflicts", { error: result.error, previous: inputs });
    }

    session.conflictPolicies = policies;
    session.resolved = result.value;
    this.invalidateFrom(session, "resolved");
    this.logger.info(
      {
        sessionId,
        collisions: result.value.report.collisions.length,
        actions: result.value.report.actions.length,
      },
      "merge.resolve_conflicts.complete",
    );
    return { ok: true, sessionId, value: result.value };
  }

  reconcile(sessionId: string, strategy: MergeStrategy): SessionOutcome<Schema> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);

    const resolved = this.ensureResolved(session);
    if (!resolved.ok) return resolved;

    const result = reconcileSchema(resolved.value, strategy);
    if (!result.ok) {
      return this.stageFailed(sessionId, "reconcile", { error: result.error, previous: resolved.value });
    }

    session.strategy = strategy;
    session.schema = result.value;
    session.merged = undefined;
    session.dedupe = undefined;
    this.logger.info(
      { sessionId, strategy: strategy.kind, columns: result.value.columns.length },
      "merge.reconcile.complete",
    );
    return { ok: true, sessionId, value: result.value };
  }

  merge(sessionId: string): SessionOutcome<TabularDataset> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);
    if (!session.schema || !session.resolved) {
      return this.notReady(sessionId, "merge", "Choose a merge strategy before merging");
    }

    const merged = mergeRows(session.resolved.datasets, session.schema);
    session.merged = merged;
    session.dedupe = undefined;
    this.logger.info({ sessionId, rows: merged.rows.length }, "merge.merge.complete");
    return { ok: true, sessionId, value: merged };
  }

  dedupe(
    sessionId: string,
    policy: DuplicatePolicy,
    columns?: string[],
  ): SessionOutcome<{ dataset: TabularDataset; report: DuplicateReport }> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);
    if (!session.merged) return this.notReady(sessionId, "dedupe", "Merge the files before removing duplicates");

    const result = dedupeRows(session.merged, policy, columns);
    if (!result.ok) {
      return this.stageFailed(sessionId, "dedupe", { error: result.error, previous: session.merged });
    }

    session.dedupe = { policy, columns, ...result.value };
    this.logger.info(
      {
        sessionId,
        policy,
        groups: result.value.report.groups.length,
        removed: result.value.report.removedCount,
      },
      "merge.dedupe.complete",
    );
    return { ok: true, sessionId, value: result.value };
  }

  /**
   * Export the deduplicated dataset, or the merged one if dedupe was skipped.
   */
  export(
    sessionId: string,
    format: ExportFormat,
    options: ExportOptions,
  ): SessionOutcome<{ bytes: Buffer; rows: number }> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);

    const dataset = session.dedupe?.dataset ?? session.merged;
    if (!dataset) return this.notReady(sessionId, "export", "Nothing merged yet");

    const result = exportDataset(dataset, format, options);
    if (!result.ok) {
      return this.stageFailed(sessionId, "export", { error: result.error, previous: dataset });
    }

    this.logger.info(
      { sessionId, format: format.kind, bytes: result.value.byteLength, rows: dataset.rows.length },
      "merge.export.complete",
    );
    return { ok: true, sessionId, value: { bytes: result.value, rows: dataset.rows.length } };
  }

  /**
   * Run conflict resolution, reconciliation, merge and dedupe in order,
   * stopping at the first failing stage.
   */
  runAll(sessionId: string, options: RunAllOptions): SessionOutcome<MergeSessionSummary> {
    const resolved = this.resolveConflicts(sessionId, options.conflicts);
    if (!resolved.ok) return resolved;

    const schema = this.reconcile(sessionId, options.strategy);
    if (!schema.ok) return schema;

    const merged = this.merge(sessionId);
    if (!merged.ok) return merged;

    const deduped = this.dedupe(sessionId, options.duplicatePolicy, options.comparisonColumns);
    if (!deduped.ok) return deduped;

    return this.describe(sessionId);
  }

  preview(sessionId: string, stage: MergeStageName): SessionOutcome<DatasetPreview[]> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);

    let datasets: readonly TabularDataset[] | undefined;
    switch (stage) {
      case "sources":
        datasets = session.sources.map((s) => s.dataset);
        break;
      case "resolved":
        datasets = session.resolved?.datasets;
        break;
      case "merged":
        datasets = session.merged ? [session.merged] : undefined;
        break;
      case "deduped":
        datasets = session.dedupe ? [session.dedupe.dataset] : undefined;
        break;
    }
    if (!datasets) return this.notReady(sessionId, "preview", `Stage "${stage}" has not run`);

    return {
      ok: true,
      sessionId,
      value: datasets.map((d) => previewDataset(d, this.previewRowLimit)),
    };
  }

  describe(sessionId: string): SessionOutcome<MergeSessionSummary> {
    const session = this.sessions.get(sessionId);
    if (!session) return this.notFound(sessionId);
    return { ok: true, sessionId, value: this.summarize(session) };
  }

  discard(sessionId: string): boolean {
    const removed = this.sessions.discard(sessionId);
    if (removed) this.logger.info({ sessionId }, "merge.session.discarded");
    return removed;
  }

  private ensureResolved(session: MergeSession): SessionOutcome<TabularDataset[]> {
    if (session.resolved) return { ok: true, sessionId: session.id, value: session.resolved.datasets };
    if (session.sources.length === 0) return this.notReady(session.id, "reconcile", "No files uploaded");

    const result = this.resolveConflicts(session.id);
    if (!result.ok) return result;
    return { ok: true, sessionId: session.id, value: result.value.datasets };
  }

  private invalidateFrom(session: MergeSession, stage: "sources" | "resolved"): void {
    if (stage === "sources") session.resolved = undefined;
    session.schema = undefined;
    session.merged = undefined;
    session.dedupe = undefined;
  }

  private summarize(session: MergeSession): MergeSessionSummary {
    return {
      id: session.id,
      createdAt: session.createdAt,
      lastAccessedAt: session.lastAccessedAt,
      sources: session.sources.map(({ dataset, report }) => ({
        sourceId: dataset.sourceId,
        columns: dataset.columns.map((c) => c.name),
        rowCount: dataset.rows.length,
        malformedRows: report.malformedRows,
        renamedHeaders: report.renamedHeaders,
      })),
      conflictPolicies: session.conflictPolicies,
      conflictReport: session.resolved?.report ?? null,
      strategy: session.strategy ?? null,
      schema: session.schema ?? null,
      mergedRows: session.merged?.rows.length ?? null,
      dedupe: session.dedupe
        ? {
            policy: session.dedupe.policy,
            columns: session.dedupe.columns ?? null,
            report: session.dedupe.report,
          }
        : null,
    };
  }

  private notFound(sessionId: string): SessionOutcome<never> {
    return {
      ok: false,
      sessionId,
      error: new SessionError("SESSION_NOT_FOUND", `Merge session ${sessionId} not found or expired`),
    };
  }

  private notReady(sessionId: string, stage: string, message: string): SessionOutcome<never> {
    return this.stageFailed(sessionId, stage, { error: new SessionError("STAGE_NOT_READY", message) });
  }

  private stageFailed(
    sessionId: string | null,
    stage: string,
    failure: { error: MergeStageError | SessionError; previous?: TabularDataset | TabularDataset[] },
  ): SessionOutcome<never> {
    this.logger.warn(
      { sessionId, stage, code: failure.error.code, message: failure.error.message },
      `merge.${stage}.failed`,
    );
    return { ok: false, sessionId, ...failure };
  }
}
