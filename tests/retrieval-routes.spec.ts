import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../server/app";
import { documentIdFor } from "../server/services/retrieval/ingest";
import { CORPUS, createTestContext, seedCorpus } from "./helpers/retrieval-fixtures";

const setup = () => {
  const ctx = createTestContext({ MAX_SEARCH_RESULTS: "20" });
  return { ctx, app: createApp(ctx) };
};

describe("document routes", () => {
  it("creates a document once and reports duplicates with 200", async () => {
    const { app } = setup();
    const first = await request(app).post("/api/documents").send(CORPUS.solar);
    expect(first.status).toBe(201);
    expect(first.body.created).toBe(true);
    expect(first.body.document).toMatchObject({
      id: documentIdFor(CORPUS.solar.text),
      status: "completed",
      chunkCount: 1,
    });

    const again = await request(app).post("/api/documents").send(CORPUS.solar);
    expect(again.status).toBe(200);
    expect(again.body.created).toBe(false);
  });

  it("rejects invalid bodies with the validation issues", async () => {
    const { app } = setup();
    const res = await request(app).post("/api/documents").send({ title: "No text" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("validation_failed");
    expect(res.body.message).toBe("invalid document");
    expect(res.body.issues).toEqual(["text: Required"]);
  });

  it("rejects malformed JSON", async () => {
    const { app } = setup();
    const res = await request(app).post("/api/documents").set("Content-Type", "application/json").send("{oops");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "validation_failed", message: "request body is not valid JSON", issues: [] });
  });

  it("reads, lists chunks of, reprocesses and deletes a document", async () => {
    const { ctx, app } = setup();
    const ids = await seedCorpus(ctx);

    const doc = await request(app).get(`/api/documents/${ids.wind}`);
    expect(doc.status).toBe(200);
    expect(doc.body.document.title).toBe(CORPUS.wind.title);

    const chunks = await request(app).get(`/api/documents/${ids.wind}/chunks`);
    expect(chunks.status).toBe(200);
    expect(chunks.body.chunks).toHaveLength(1);
    expect(chunks.body.chunks[0]).toMatchObject({ id: `${ids.wind}:0`, embeddingDim: 64 });
    expect(chunks.body.chunks[0].embedding).toBeUndefined();

    const reprocessed = await request(app).post(`/api/documents/${ids.wind}/reprocess`);
    expect(reprocessed.status).toBe(200);
    expect(reprocessed.body.document.status).toBe("completed");

    expect((await request(app).delete(`/api/documents/${ids.wind}`)).status).toBe(204);
    const gone = await request(app).get(`/api/documents/${ids.wind}`);
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual({ error: "not_found", message: `document ${ids.wind} not found` });
  });

  it("lists similar documents", async () => {
    const { ctx, app } = setup();
    const ids = await seedCorpus(ctx);
    const res = await request(app).get(`/api/documents/${ids.solar}/similar`).query({ limit: "1" });
    expect(res.status).toBe(200);
    expect(res.body.documentId).toBe(ids.solar);
    expect(res.body.results).toHaveLength(1);
  });
});

describe("search routes", () => {
  it("answers 409 before anything is indexed", async () => {
    const { app } = setup();
    const res = await request(app).get("/api/search").query({ q: "solar" });
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: "index_empty", message: "index contains no chunks" });
  });

  it("searches with query parameters", async () => {
    const { ctx, app } = setup();
    const ids = await seedCorpus(ctx);
    const res = await request(app).get("/api/search").query({ q: "solar", mode: "keyword", limit: "1" });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ query: "solar", mode: "keyword", limit: 1, cached: false, degraded: [] });
    expect(res.body.results).toHaveLength(1);
    expect(res.body.results[0]).toMatchObject({ documentId: ids.solar, keywordScore: 2, fusedScore: 1 });
  });

  it("rejects bad parameters", async () => {
    const { ctx, app } = setup();
    await seedCorpus(ctx);
    const res = await request(app).get("/api/search").query({ q: "solar", limit: "ten" });
    expect(res.status).toBe(400);
    expect(res.body.issues).toEqual(["limit must be an integer between 1 and 20"]);

    const missing = await request(app).get("/api/search");
    expect(missing.status).toBe(400);
    expect(missing.body.issues).toEqual(["query must not be empty"]);
  });

  it("suggests completions", async () => {
    const { ctx, app } = setup();
    await seedCorpus(ctx);
    const res = await request(app).get("/api/search/suggest").query({ q: "turbin" });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ query: "turbin", suggestions: ["turbine", "turbines"] });
  });
});

describe("service routes", () => {
  it("reports stats and health", async () => {
    const { ctx, app } = setup();
    await seedCorpus(ctx);
    const stats = await request(app).get("/api/stats");
    expect(stats.status).toBe(200);
    expect(stats.body).toMatchObject({ documents: 3, chunks: 3, documentsByStatus: { completed: 3 } });

    const health = await request(app).get("/healthz");
    expect(health.body).toEqual({ ok: true, store: "memory" });
  });

  it("exposes prometheus metrics", async () => {
    const { app } = setup();
    const res = await request(app).get("/metrics");
    expect(res.status).toBe(200);
    expect(res.text).toContain("# TYPE");
  });

  it("answers unknown api paths with 404", async () => {
    const { app } = setup();
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body.error).toBe("not_found");
  });
});
