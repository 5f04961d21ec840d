import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { MergeSessionRepository } from "../../repositories/mergeSessionRepository";
import { MergeSessionService } from "../mergeSessionService";
import { csvInput } from "../merge/__tests__/fixtures";

const logger = pino({ level: "silent" });

describe("MergeSessionService", () => {
  let now: number;
  let service: MergeSessionService;

  beforeEach(() => {
    now = 0;
    service = new MergeSessionService(new MergeSessionRepository(60_000, () => now), logger, 1);
  });

  const file1 = () => csvInput("File1.csv", "Name,Price\nBolt,5\nBolt,5\n");
  const file2 = () => csvInput("File2.csv", "Name,Qty\nBolt,2\n");

  function uploaded(): string {
    const result = service.upload(undefined, [file1(), file2()]);
    if (!result.ok) throw result.error;
    return result.sessionId;
  }

  it("creates a session on first upload and reports each file", () => {
    const result = service.upload(undefined, [file1(), csvInput("bad.csv", "A,B\n1\n2,3\n")]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.reports.map((r) => [r.sourceId, r.rowCount, r.malformedRows.length])).toEqual([
      ["File1.csv", 2, 0],
      ["bad.csv", 1, 1],
    ]);
    expect(result.value.summary.sources.map((s) => s.columns)).toEqual([["Name", "Price"], ["A", "B"]]);
  });

  it("does not create a session when the upload fails", () => {
    const result = service.upload(undefined, [csvInput("empty.csv", "")]);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.sessionId).toBeNull();
    expect(result.error.code).toBe("LOAD_ERROR");
  });

  it("adds files to an existing session and refuses a repeated source id", () => {
    const first = service.upload(undefined, [file1()]);
    if (!first.ok) throw first.error;

    const added = service.upload(first.sessionId, [file2()]);
    const repeated = service.upload(first.sessionId, [file1()]);

    expect(added.ok && added.value.summary.sources.map((s) => s.sourceId)).toEqual(["File1.csv", "File2.csv"]);
    expect(repeated.ok).toBe(false);
    if (repeated.ok) return;
    expect(repeated.error.code).toBe("STAGE_NOT_READY");
    expect(repeated.error.message).toBe('Source "File1.csv" is already loaded; remove it before uploading it again');
  });

  it("runs the stages one at a time", () => {
    const id = uploaded();

    const schema = service.reconcile(id, { kind: "union" });
    const merged = service.merge(id);
    const deduped = service.dedupe(id, "keepFirst");
    const exported = service.export(
      id,
      { kind: "csv", separator: "comma", encoding: "utf-8" },
      { materializeNulls: true },
    );

    expect(schema.ok && schema.value.columns.map((c) => c.name)).toEqual(["Name", "Price", "Qty"]);
    expect(merged.ok && merged.value.rows).toHaveLength(3);
    expect(deduped.ok && deduped.value.report.removedCount).toBe(1);
    expect(exported.ok && exported.value.rows).toBe(2);
    expect(exported.ok && exported.value.bytes.toString("utf8")).toBe("Name,Price,Qty\nBolt,5,\nBolt,,2\n");
  });

  it("exports the merged table when dedupe was skipped", () => {
    const id = uploaded();
    service.reconcile(id, { kind: "intersection" });
    service.merge(id);

    const exported = service.export(id, { kind: "csv", separator: "comma", encoding: "utf-8" }, { materializeNulls: false });

    expect(exported.ok && exported.value.bytes.toString("utf8")).toBe("Name\nBolt\nBolt\nBolt\n");
  });

  it("refuses stages whose input is missing", () => {
    const id = uploaded();

    const merge = service.merge(id);
    const dedupe = service.dedupe(id, "keepAll");
    const preview = service.preview(id, "merged");

    expect(!merge.ok && merge.error.message).toBe("Choose a merge strategy before merging");
    expect(!dedupe.ok && dedupe.error.message).toBe("Merge the files before removing duplicates");
    expect(!preview.ok && preview.error.message).toBe('Stage "merged" has not run');
  });

  it("keeps the prior stage output when a stage fails", () => {
    const upload = service.upload(undefined, [csvInput("a.csv", "Name\nBolt\n"), csvInput("b.csv", "Qty\n2\n")]);
    if (!upload.ok) throw upload.error;

    const result = service.reconcile(upload.sessionId, { kind: "intersection" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("EMPTY_INTERSECTION");
    expect(Array.isArray(result.previous) && result.previous.map((d) => d.sourceId)).toEqual(["a.csv", "b.csv"]);

    const retry = service.reconcile(upload.sessionId, { kind: "union" });
    expect(retry.ok && retry.value.columns.map((c) => c.name)).toEqual(["Name", "Qty"]);
  });

  it("clears later stages when an earlier one is re-run", () => {
    const id = uploaded();
    const run = service.runAll(id, { strategy: { kind: "union" }, duplicatePolicy: "keepFirst" });
    expect(run.ok && run.value.dedupe?.report.outputRows).toBe(2);

    service.reconcile(id, { kind: "intersection" });
    const summary = service.describe(id);

    expect(summary.ok && summary.value.mergedRows).toBeNull();
    expect(summary.ok && summary.value.dedupe).toBeNull();
    expect(summary.ok && summary.value.strategy).toEqual({ kind: "intersection" });
  });

  it("re-resolves conflicts after a source is removed", () => {
    const id = uploaded();
    service.runAll(id, { strategy: { kind: "union" }, duplicatePolicy: "keepAll" });

    const removed = service.removeSource(id, "File2.csv");
    const missing = service.removeSource(id, "File2.csv");
    const schema = service.reconcile(id, { kind: "union" });

    expect(removed.ok && removed.value.conflictReport).toBeNull();
    expect(!missing.ok && missing.error.message).toBe('Source "File2.csv" is not loaded');
    expect(schema.ok && schema.value.columns.map((c) => c.name)).toEqual(["Name", "Price"]);
  });

  it("applies conflict policies and stops runAll at the failing stage", () => {
    const id = service.upload(undefined, [
      csvInput("a.csv", "Name,Price\nBolt,5\n"),
      csvInput("b.csv", "Name,Price\nBolt,6\n"),
    ]);
    if (!id.ok) throw id.error;

    const resolved = service.resolveConflicts(id.sessionId, { Price: { kind: "rename" } });
    const failed = service.runAll(id.sessionId, {
      strategy: { kind: "union" },
      duplicatePolicy: "keepFirst",
      comparisonColumns: ["Colour"],
    });

    expect(resolved.ok && resolved.value.datasets.map((d) => d.columns.map((c) => c.name))).toEqual([
      ["Name", "Price_a"],
      ["Name", "Price_b"],
    ]);
    expect(!failed.ok && failed.error.code).toBe("UNKNOWN_COLUMN");
    const summary = service.describe(id.sessionId);
    expect(summary.ok && summary.value.mergedRows).toBe(2);
    expect(summary.ok && summary.value.schema?.columns.map((c) => c.name)).toEqual(["Name", "Price_a", "Price_b"]);
  });

  it("previews at most the configured number of rows", () => {
    const id = uploaded();

    const preview = service.preview(id, "sources");

    expect(preview.ok).toBe(true);
    if (!preview.ok) return;
    expect(preview.value.map((p) => [p.sourceId, p.rows.length, p.totalRows])).toEqual([
      ["File1.csv", 1, 2],
      ["File2.csv", 1, 1],
    ]);
    expect(preview.value[0].rows[0]).toEqual({ Name: "Bolt", Price: "5" });
  });

  it("forgets expired and discarded sessions", () => {
    const id = uploaded();
    const other = uploaded();

    expect(service.discard(other)).toBe(true);
    now = 60_000;

    const result = service.describe(id);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("SESSION_NOT_FOUND");
    expect(result.error.message).toBe(`Merge session ${id} not found or expired`);
  });
});
