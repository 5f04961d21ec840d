import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { base64, postJson, startTestServer, type TestServer } from "../../test/httpHarness";
import { statusForCode } from "../mergeSessions";

describe("merge session routes", () => {
  let server: TestServer;
  let api: string;

  beforeAll(async () => {
    server = await startTestServer({ config: { maxUploadBytes: 1024, previewRowLimit: 5 } });
    api = `${server.baseUrl}/api/merge/sessions`;
  });

  afterAll(async () => {
    await server.close();
  });

  const file = (sourceId: string, text: string) => ({ sourceId, content: base64(text) });

  async function createSession(files: unknown[]): Promise<string> {
    const res = await postJson(api, { files });
    expect(res.status).toBe(201);
    const body: unknown = await res.json();
    if (typeof body !== "object" || body === null || !("sessionId" in body) || typeof body.sessionId !== "string") {
      throw new Error("response has no sessionId");
    }
    return body.sessionId;
  }

  it("uploads, runs and exports a merge", async () => {
    const id = await createSession([
      file("File1.csv", "Name,Price\nBolt,5\n"),
      file("File2.csv", "Name,Qty\nBolt,2\n"),
    ]);

    const run = await postJson(`${api}/${id}/run`, { strategy: { kind: "union" }, duplicatePolicy: "keepFirst" });
    expect(run.status).toBe(200);
    expect(await run.json()).toMatchObject({
      ok: true,
      sessionId: id,
      summary: { mergedRows: 2, schema: { columns: [{ name: "Name" }, { name: "Price" }, { name: "Qty" }] } },
    });

    const exported = await postJson(`${api}/${id}/export`, { materializeNulls: true, fileName: "cards" });
    expect(exported.status).toBe(200);
    expect(exported.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(exported.headers.get("content-disposition")).toBe('attachment; filename="cards.csv"');
    expect(await exported.text()).toBe("Name,Price,Qty\nBolt,5,\nBolt,,2\n");
  });

  it("runs stages one request at a time and previews them", async () => {
    const id = await createSession([file("a.csv", "Name,Qty\nBolt,2\nBolt,2\n")]);

    expect((await postJson(`${api}/${id}/reconcile`, { strategy: { kind: "union" } })).status).toBe(200);
    expect((await postJson(`${api}/${id}/merge`, {})).status).toBe(200);
    const dedupe = await postJson(`${api}/${id}/dedupe`, { policy: "dropAllDuplicates" });
    expect(await dedupe.json()).toMatchObject({ report: { removedCount: 2, outputRows: 0 } });

    const preview = await fetch(`${api}/${id}/preview/merged`);
    expect(await preview.json()).toEqual({
      ok: true,
      sessionId: id,
      stage: "merged",
      previews: [
        {
          sourceId: "merged",
          columns: [
            { name: "Name", declaredType: "unknown" },
            { name: "Qty", declaredType: "unknown" },
          ],
          rows: [
            { Name: "Bolt", Qty: "2" },
            { Name: "Bolt", Qty: "2" },
          ],
          totalRows: 2,
        },
      ],
    });
  });

  it("returns the failed stage's input with the error", async () => {
    const id = await createSession([file("a.csv", "Name\nBolt\n"), file("b.csv", "Qty\n2\n")]);

    const res = await postJson(`${api}/${id}/reconcile`, { strategy: { kind: "intersection" } });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      ok: false,
      sessionId: id,
      error: "EMPTY_INTERSECTION",
      previous: [{ sourceId: "a.csv" }, { sourceId: "b.csv" }],
    });
  });

  it("parses declared column types from the upload", async () => {
    const id = await createSession([{ ...file("a.csv", "Name,Qty\nBolt,2\n"), columnTypes: { Qty: "number" } }]);

    const summary = await fetch(`${api}/${id}`);
    expect(await summary.json()).toMatchObject({
      summary: { sources: [{ sourceId: "a.csv", columns: ["Name", "Qty"], rowCount: 1 }] },
    });
    const preview = await fetch(`${api}/${id}/preview/sources`);
    expect(await preview.json()).toMatchObject({ previews: [{ rows: [{ Name: "Bolt", Qty: 2 }] }] });
  });

  it("adds and removes files", async () => {
    const id = await createSession([file("a.csv", "Name\nBolt\n")]);

    const added = await postJson(`${api}/${id}/files`, { files: [file("b.csv", "Name\nShock\n")] });
    expect(added.status).toBe(200);
    const repeated = await postJson(`${api}/${id}/files`, { files: [file("b.csv", "Name\nShock\n")] });
    expect(repeated.status).toBe(409);

    const removed = await fetch(`${api}/${id}/files/b.csv`, { method: "DELETE" });
    expect(await removed.json()).toMatchObject({ summary: { sources: [{ sourceId: "a.csv" }] } });
  });

  it("rejects bad requests", async () => {
    const id = await createSession([file("a.csv", "Name\nBolt\n")]);

    const badStrategy = await postJson(`${api}/${id}/reconcile`, { strategy: { kind: "zip" } });
    const badStage = await fetch(`${api}/${id}/preview/final`);
    const notMerged = await postJson(`${api}/${id}/export`, {});
    const noFiles = await postJson(api, { files: [] });
    const notBase64 = await postJson(api, { files: [{ sourceId: "a.csv", content: "not base64!" }] });

    expect(badStrategy.status).toBe(400);
    expect(await badStrategy.json()).toMatchObject({ error: "BAD_REQUEST" });
    expect(badStage.status).toBe(400);
    expect(notMerged.status).toBe(409);
    expect(noFiles.status).toBe(400);
    expect(notBase64.status).toBe(400);
  });

  it("refuses files over the size limit", async () => {
    const res = await postJson(api, { files: [file("big.csv", `Name\n${"x".repeat(1500)}\n`)] });

    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ error: "PAYLOAD_TOO_LARGE" });
  });

  it("reports unknown and discarded sessions as not found", async () => {
    const id = await createSession([file("a.csv", "Name\nBolt\n")]);

    expect((await fetch(`${api}/${id}`)).status).toBe(200);
    expect((await fetch(`${api}/${id}`, { method: "DELETE" })).status).toBe(204);
    const gone = await fetch(`${api}/${id}`);
    expect(gone.status).toBe(404);
    expect(await gone.json()).toEqual({
      ok: false,
      sessionId: id,
      error: "SESSION_NOT_FOUND",
      message: `Merge session ${id} not found or expired`,
    });
    expect((await fetch(`${api}/${id}`, { method: "DELETE" })).status).toBe(404);
  });

  it("maps error codes to statuses", () => {
    expect(statusForCode("LOAD_ERROR")).toBe(400);
    expect(statusForCode("EXPORT_ERROR")).toBe(422);
    expect(statusForCode("STAGE_NOT_READY")).toBe(409);
    expect(statusForCode("SOMETHING_ELSE")).toBe(500);
  });
});

describe("app shell", () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  it("reports health", async () => {
    const res = await fetch(`${server.baseUrl}/api/health`);

    expect(await res.json()).toEqual({ status: "ok", sessions: 0, marketplaceConfigured: false });
  });

  it("answers unknown routes and malformed JSON with JSON errors", async () => {
    const missing = await fetch(`${server.baseUrl}/api/nowhere`);
    const malformed = await fetch(`${server.baseUrl}/api/merge/sessions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });

    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ ok: false, error: "NOT_FOUND", message: "No route for GET /api/nowhere" });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ ok: false, error: "BAD_REQUEST" });
  });
});
