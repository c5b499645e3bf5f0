import { describe, expect, it, vi } from "vitest";
import { HashEmbeddingProvider } from "../server/services/embeddings/providers";
import type { ScoredChunkId } from "../server/services/retrieval/index-store";
import {
  CacheError,
  EmptyIndexError,
  NotFoundError,
  ProviderError,
  ValidationError,
} from "../server/services/retrieval/errors";
import { MemorySearchCache } from "../server/services/retrieval/search-cache";
import { CORPUS, createTestContext, seedCorpus, SwitchableProvider } from "./helpers/retrieval-fixtures";

const hangUntilAborted = (signal?: AbortSignal) =>
  new Promise<ScoredChunkId[]>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

describe("search validation", () => {
  const ctx = createTestContext({ MAX_QUERY_CHARS: "20", MAX_SEARCH_RESULTS: "25" });

  it("rejects blank and oversized queries", async () => {
    await expect(ctx.search.search({ query: "   " })).rejects.toMatchObject({
      status: 400,
      issues: ["query must not be empty"],
    });
    await expect(ctx.search.search({ query: "x".repeat(21) })).rejects.toMatchObject({
      issues: ["query must be at most 20 characters"],
    });
  });

  it("rejects unknown modes and out-of-range limits together", async () => {
    await expect(ctx.search.search({ query: "solar", mode: "fuzzy", limit: 0 })).rejects.toMatchObject({
      issues: ["mode must be one of semantic, keyword, hybrid", "limit must be an integer between 1 and 25"],
    });
    await expect(ctx.search.search({ query: "solar", limit: 26 })).rejects.toBeInstanceOf(ValidationError);
    await expect(ctx.search.search({ query: "solar", limit: 2.5 })).rejects.toBeInstanceOf(ValidationError);
  });

  it("defaults to hybrid mode and ten results", () => {
    expect(ctx.search.validate({ query: "  solar  " })).toEqual({ query: "solar", mode: "hybrid", limit: 10 });
  });

  it("reports an empty index", async () => {
    await expect(ctx.search.search({ query: "solar" })).rejects.toBeInstanceOf(EmptyIndexError);
  });
});

describe("search", () => {
  it("ranks keyword hits by term frequency", async () => {
    const ctx = createTestContext();
    const ids = await seedCorpus(ctx);
    const response = await ctx.search.search({ query: "Solar", mode: "keyword" });

    expect(response.cached).toBe(false);
    expect(response.embeddingSource).toBeNull();
    expect(response.degraded).toEqual([]);
    expect(response.states).toEqual(["received", "retrieving", "fusing", "cached", "returned"]);
    expect(response.results).toEqual([
      {
        chunkId: `${ids.solar}:0`,
        documentId: ids.solar,
        sequenceIndex: 0,
        content: CORPUS.solar.text,
        semanticScore: 0,
        keywordScore: 2,
        fusedScore: 1,
        matchedKeywords: ["solar"],
        context: CORPUS.solar.text,
      },
      {
        chunkId: `${ids.grid}:0`,
        documentId: ids.grid,
        sequenceIndex: 0,
        content: CORPUS.grid.text,
        semanticScore: 0,
        keywordScore: 1,
        fusedScore: 0,
        matchedKeywords: ["solar"],
        context: CORPUS.grid.text,
      },
    ]);
  });

  it("returns an empty list when nothing matches", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const response = await ctx.search.search({ query: "volcano", mode: "keyword" });
    expect(response.results).toEqual([]);
  });

  it("serves a repeated query from the cache", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const first = await ctx.search.search({ query: "wind power", mode: "hybrid", limit: 5 });
    const keywordSearch = vi.spyOn(ctx.store, "keywordSearch");
    const second = await ctx.search.search({ query: "  WIND   power ", mode: "hybrid", limit: 5 });

    expect(first.embeddingSource).toBe("primary");
    expect(first.states).toEqual(["received", "embedding", "retrieving", "fusing", "cached", "returned"]);
    expect(second.cached).toBe(true);
    expect(second.states).toEqual(["received", "returned"]);
    expect(second.results).toEqual(first.results);
    expect(keywordSearch).not.toHaveBeenCalled();
  });

  it("keys the cache on mode and limit", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const base = ctx.search.validate({ query: "solar" });
    expect(ctx.search.fingerprint(base)).toBe(ctx.search.fingerprint({ ...base, query: "SOLAR" }));
    expect(ctx.search.fingerprint(base)).not.toBe(ctx.search.fingerprint({ ...base, mode: "keyword" }));
    expect(ctx.search.fingerprint(base)).not.toBe(ctx.search.fingerprint({ ...base, limit: 11 }));
  });

  it("keys the cache on the context window and the index generation", async () => {
    const ctx = createTestContext();
    const wider = createTestContext({ CONTEXT_WINDOW_CHARS: "400" });
    const base = ctx.search.validate({ query: "solar" });
    expect(ctx.search.fingerprint(base)).not.toBe(wider.search.fingerprint(base));
    expect(ctx.search.fingerprint(base, 0)).not.toBe(ctx.search.fingerprint(base, 1));

    await seedCorpus(ctx);
    expect(ctx.search.fingerprint(base)).toBe(ctx.search.fingerprint(base, 3));
  });

  it("orders a repeated computation identically", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const first = await ctx.search.search({ query: "wind power storage" });
    await ctx.cache.clear();
    const second = await ctx.search.search({ query: "wind power storage" });

    expect(second.cached).toBe(false);
    expect(second.results.map((result) => result.chunkId)).toEqual(first.results.map((result) => result.chunkId));
    expect(second.results).toEqual(first.results);
  });

  it("gives a keyword match a positive fused score in hybrid mode", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const { document } = await ctx.ingest.ingest({
      title: "Climate policy",
      text: "Climate policy sets carbon prices and emission caps.",
    });

    const response = await ctx.search.search({ query: "climate change" });
    const hit = response.results.find((result) => result.documentId === document.id);
    expect(hit).toMatchObject({ keywordScore: 1, matchedKeywords: ["climate"] });
    expect(hit?.fusedScore).toBeGreaterThan(0);
  });

  it("does not cache a ranking computed while the index changed", async () => {
    const ctx = createTestContext();
    const ids = await seedCorpus(ctx);
    const original = ctx.store.keywordSearch.bind(ctx.store);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let held = false;
    vi.spyOn(ctx.store, "keywordSearch").mockImplementationOnce(async (terms, k, options) => {
      const hits = await original(terms, k, options);
      held = true;
      await gate;
      return hits;
    });

    const pending = ctx.search.search({ query: "solar", mode: "keyword" });
    await vi.waitFor(() => expect(held).toBe(true));
    const farm = await ctx.ingest.ingest({ title: "Solar farm", text: "Solar solar solar farms cover whole fields." });
    release();

    const stale = await pending;
    expect(stale.results.map((result) => result.documentId)).toEqual([ids.solar, ids.grid]);
    expect(stale.states).not.toContain("cached");
    expect(await ctx.cache.size()).toBe(0);

    const fresh = await ctx.search.search({ query: "solar", mode: "keyword" });
    expect(fresh.cached).toBe(false);
    expect(fresh.results.map((result) => result.documentId)).toEqual([farm.document.id, ids.solar, ids.grid]);
  });

  it("returns semantic and keyword hits together in hybrid mode", async () => {
    const ctx = createTestContext();
    const ids = await seedCorpus(ctx);
    const response = await ctx.search.search({ query: "solar" });
    expect(response.results).toHaveLength(3);
    expect(new Set(response.results.map((result) => result.documentId))).toEqual(
      new Set([ids.solar, ids.wind, ids.grid]),
    );
    for (const result of response.results) {
      expect(result.fusedScore).toBeGreaterThanOrEqual(0);
      expect(result.fusedScore).toBeLessThanOrEqual(1);
    }
  });

  it("shares one computation between identical concurrent queries", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const keywordSearch = vi.spyOn(ctx.store, "keywordSearch");
    const [a, b] = await Promise.all([
      ctx.search.search({ query: "turbine blades", mode: "keyword" }),
      ctx.search.search({ query: "turbine blades", mode: "keyword" }),
    ]);
    expect(keywordSearch).toHaveBeenCalledTimes(1);
    expect(a.results).toEqual(b.results);
    expect(a.cached).toBe(false);
    expect(b.cached).toBe(false);
  });

  it("degrades to keyword results when the semantic leg times out", async () => {
    const ctx = createTestContext({ LEG_TIMEOUT_MS: "30" });
    const ids = await seedCorpus(ctx);
    vi.spyOn(ctx.store, "nearestNeighbors").mockImplementation((_vector, _k, _space, options) =>
      hangUntilAborted(options?.signal),
    );

    const response = await ctx.search.search({ query: "wind" });
    expect(response.degraded).toEqual([{ leg: "semantic", reason: "timeout" }]);
    expect(response.results.map((result) => result.documentId)).toEqual([ids.wind, ids.grid]);
    expect(response.states).not.toContain("cached");
    expect(await ctx.cache.size()).toBe(0);
  });

  it("fails a semantic-only search whose leg times out", async () => {
    const ctx = createTestContext({ LEG_TIMEOUT_MS: "30" });
    await seedCorpus(ctx);
    vi.spyOn(ctx.store, "nearestNeighbors").mockImplementation((_vector, _k, _space, options) =>
      hangUntilAborted(options?.signal),
    );
    await expect(ctx.search.search({ query: "wind", mode: "semantic" })).rejects.toMatchObject({
      code: "store_unavailable",
      status: 503,
    });
  });

  it("answers a semantic query from the fallback when the primary hangs", async () => {
    const provider = new SwitchableProvider();
    const ctx = createTestContext(
      { LEG_TIMEOUT_MS: "100", EMBEDDING_PROVIDER_TIMEOUT_MS: "150", MAX_RETRY_ATTEMPTS: "1" },
      { primary: provider, fallback: new HashEmbeddingProvider(64) },
    );
    expect(ctx.config.queryEmbeddingTimeoutMs).toBe(50);
    provider.stalled = true;
    const { document } = await ctx.ingest.ingest(CORPUS.wind);

    const response = await ctx.search.search({ query: "offshore wind turbines", mode: "semantic" });
    expect(response.embeddingSource).toBe("fallback");
    expect(response.degraded).toEqual([]);
    expect(response.results.map((result) => result.documentId)).toEqual([document.id]);
    expect(response.states).not.toContain("cached");

    // Ingest, then two queries: three primary timeouts open the breaker.
    await ctx.search.search({ query: "offshore wind turbines", mode: "semantic" });
    expect(provider.calls).toBe(3);
    expect(ctx.embeddings.breakerOpen()).toBe(true);
    await ctx.search.search({ query: "offshore wind turbines", mode: "semantic" });
    expect(provider.calls).toBe(3);
  });

  it("reports a hanging provider as an embedding failure, not a store failure", async () => {
    const provider = new SwitchableProvider();
    const ctx = createTestContext({ LEG_TIMEOUT_MS: "100", EMBEDDING_PROVIDER_TIMEOUT_MS: "150" }, { primary: provider });
    await seedCorpus(ctx);
    provider.stalled = true;

    await expect(ctx.search.search({ query: "wind", mode: "semantic" })).rejects.toMatchObject({
      code: "embedding_unavailable",
      status: 502,
    });
  });

  it("blames the embedding when the leg runs out of time before a query vector exists", async () => {
    const ctx = createTestContext({ LEG_TIMEOUT_MS: "30" });
    const ids = await seedCorpus(ctx);
    vi.spyOn(ctx.embeddings, "embedQuery").mockImplementation(
      (_text, signal) =>
        new Promise<null>((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
    );

    const response = await ctx.search.search({ query: "wind" });
    expect(response.degraded).toEqual([{ leg: "semantic", reason: "embedding_unavailable" }]);
    expect(response.results.map((result) => result.documentId)).toEqual([ids.wind, ids.grid]);
    await expect(ctx.search.search({ query: "wind", mode: "semantic" })).rejects.toBeInstanceOf(ProviderError);
  });

  it("goes keyword-only when the query cannot be embedded", async () => {
    const provider = new SwitchableProvider();
    const ctx = createTestContext({}, { primary: provider });
    const ids = await seedCorpus(ctx);
    provider.down = true;

    const response = await ctx.search.search({ query: "solar" });
    expect(response.degraded).toEqual([{ leg: "semantic", reason: "embedding_unavailable" }]);
    expect(response.embeddingSource).toBeNull();
    expect(response.results.map((result) => result.documentId)).toEqual([ids.solar, ids.grid]);

    await expect(ctx.search.search({ query: "solar", mode: "semantic" })).rejects.toBeInstanceOf(ProviderError);
  });

  it("rejects a search whose caller already gave up", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    const controller = new AbortController();
    controller.abort();
    await expect(ctx.search.search({ query: "solar", signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
    });
  });

  it("stops the shared computation when its only caller aborts", async () => {
    const ctx = createTestContext({ LEG_TIMEOUT_MS: "5000" });
    await seedCorpus(ctx);
    let legSignal: AbortSignal | undefined;
    vi.spyOn(ctx.store, "nearestNeighbors").mockImplementation((_vector, _k, _space, options) => {
      legSignal = options?.signal;
      return hangUntilAborted(options?.signal);
    });
    const controller = new AbortController();
    const pending = ctx.search.search({ query: "solar", mode: "semantic", signal: controller.signal });
    await vi.waitFor(() => expect(legSignal).toBeDefined());
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
    await vi.waitFor(() => expect(legSignal?.aborted).toBe(true));
  });

  it("treats cache failures as misses", async () => {
    const cache = new MemorySearchCache();
    const ctx = createTestContext({}, { cache });
    await seedCorpus(ctx);
    vi.spyOn(cache, "get").mockRejectedValue(new CacheError("get", new Error("connection reset")));
    const response = await ctx.search.search({ query: "solar", mode: "keyword" });
    expect(response.cached).toBe(false);
    expect(response.results).toHaveLength(2);
  });
});

describe("similar documents", () => {
  it("returns the best chunk of each other document", async () => {
    const ctx = createTestContext();
    const ids = await seedCorpus(ctx);
    const results = await ctx.search.similarDocuments(ids.solar, 5);
    expect(results).toHaveLength(2);
    expect(results.map((result) => result.documentId).sort()).toEqual([ids.wind, ids.grid].sort());
    expect(results[0].fusedScore).toBeGreaterThanOrEqual(results[1].fusedScore);
  });

  it("honors the limit", async () => {
    const ctx = createTestContext();
    const ids = await seedCorpus(ctx);
    expect(await ctx.search.similarDocuments(ids.solar, 1)).toHaveLength(1);
  });

  it("rejects unknown documents", async () => {
    const ctx = createTestContext();
    await expect(ctx.search.similarDocuments("missing", 5)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("suggestions", () => {
  it("completes partial terms from the index", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    expect(await ctx.search.suggest("SOL")).toEqual(["solar"]);
    expect(await ctx.search.suggest("turbin")).toEqual(["turbine", "turbines"]);
  });

  it("needs at least two characters", async () => {
    const ctx = createTestContext();
    await seedCorpus(ctx);
    expect(await ctx.search.suggest("s")).toEqual([]);
    expect(await ctx.search.suggest("!?")).toEqual([]);
  });
});
