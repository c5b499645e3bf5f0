import { describe, expect, it } from "vitest";
import { normalizeWeights, readRetrievalConfig } from "../server/config/retrieval";
import { checkVectors, HashEmbeddingProvider, isRetryableStatus } from "../server/services/embeddings/providers";
import { createRetrievalContext } from "../server/services/retrieval/context";
import { ProviderError, ValidationError } from "../server/services/retrieval/errors";

describe("readRetrievalConfig", () => {
  it("applies defaults", () => {
    const config = readRetrievalConfig({});
    expect(config).toMatchObject({
      chunkSize: 1000,
      chunkOverlap: 200,
      weights: { semantic: 0.7, keyword: 0.3 },
      maxResults: 50,
      maxQueryChars: 500,
      contextWindowChars: 200,
      overFetchMultiplier: 3,
      legTimeoutMs: 10_000,
      embeddingProviderTimeoutMs: 15_000,
      queryEmbeddingTimeoutMs: 5_000,
      cacheRetentionHours: 1,
      indexStore: "pg",
      port: 5055,
      localEmbeddingDim: 384,
      openai: { model: "text-embedding-3-small", dimensions: 1536 },
    });
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = readRetrievalConfig({
      CHUNK_SIZE: "400",
      CHUNK_OVERLAP: "0",
      SEMANTIC_WEIGHT: "2",
      KEYWORD_WEIGHT: "2",
      INDEX_STORE: "memory",
      OPENAI_API_KEY: "  test-secret  ",
      DATABASE_URL: "   ",
      PORT: "",
    });
    expect(config.chunkSize).toBe(400);
    expect(config.chunkOverlap).toBe(0);
    expect(config.weights).toEqual({ semantic: 0.5, keyword: 0.5 });
    expect(config.indexStore).toBe("memory");
    expect(config.openai.apiKey).toBe("test-secret");
    expect(config.databaseUrl).toBeUndefined();
    expect(config.port).toBe(5055);
  });

  it("rejects an overlap that swallows the chunk", () => {
    expect(() => readRetrievalConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(ValidationError);
  });

  it("rejects malformed numbers and unknown stores", () => {
    expect(() => readRetrievalConfig({ CHUNK_SIZE: "lots" })).toThrow("invalid retrieval configuration");
    expect(() => readRetrievalConfig({ INDEX_STORE: "redis" })).toThrow(ValidationError);
    expect(() => readRetrievalConfig({ SEMANTIC_WEIGHT: "0", KEYWORD_WEIGHT: "0" })).toThrow(ValidationError);
  });

  it("keeps query embedding inside the leg budget", () => {
    expect(readRetrievalConfig({ LEG_TIMEOUT_MS: "4000", EMBEDDING_PROVIDER_TIMEOUT_MS: "1000" }).queryEmbeddingTimeoutMs).toBe(1000);
    expect(readRetrievalConfig({ LEG_TIMEOUT_MS: "4000", QUERY_EMBEDDING_TIMEOUT_MS: "3000" }).queryEmbeddingTimeoutMs).toBe(3000);
    expect(() => readRetrievalConfig({ LEG_TIMEOUT_MS: "4000", QUERY_EMBEDDING_TIMEOUT_MS: "4000" })).toThrow(ValidationError);
  });

  it("normalizes weights to sum to one", () => {
    expect(normalizeWeights(3, 1)).toEqual({ semantic: 0.75, keyword: 0.25 });
  });
});

describe("createRetrievalContext", () => {
  it("uses the hosted model with a local fallback when a key is set", () => {
    const config = readRetrievalConfig({ INDEX_STORE: "memory", OPENAI_API_KEY: "test-secret" });
    const ctx = createRetrievalContext(config);
    expect(ctx.store.kind).toBe("memory");
    expect(ctx.embeddings.primarySpace).toBe("openai:text-embedding-3-small/1536");
    expect(ctx.embeddings.fallbackSpace).toBe("local-hash/384");
  });

  it("embeds locally without a key", () => {
    const ctx = createRetrievalContext(readRetrievalConfig({ INDEX_STORE: "memory" }));
    expect(ctx.embeddings.primarySpace).toBe("local-hash/384");
    expect(ctx.embeddings.fallbackSpace).toBeNull();
  });
});

describe("provider helpers", () => {
  it("retries only transient upstream statuses", () => {
    expect([400, 401, 408, 429, 500, 503].map(isRetryableStatus)).toEqual([false, false, true, true, true, true]);
  });

  it("rejects malformed provider output", () => {
    const provider = new HashEmbeddingProvider(2);
    expect(checkVectors(provider, ["a"], [[0.6, 0.8]])).toEqual([[0.6, 0.8]]);
    expect(() => checkVectors(provider, ["a", "b"], [[0.6, 0.8]])).toThrow(ProviderError);
    expect(() => checkVectors(provider, ["a"], [[1, 2, 3]])).toThrow("local-hash: returned a malformed vector");
    expect(() => checkVectors(provider, ["a"], [[Number.NaN, 1]])).toThrow(ProviderError);
  });
});
