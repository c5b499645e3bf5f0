import { z } from "zod";
import { ValidationError } from "../services/retrieval/errors";

const envNumber = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().finite().default(fallback),
  );

const envInt = (fallback: number, min: number) =>
  envNumber(fallback).pipe(z.number().int().min(min));

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
  z.string().optional(),
);

const RetrievalEnv = z.object({
  CHUNK_SIZE: envInt(1000, 1),
  CHUNK_OVERLAP: envInt(200, 0),
  SEMANTIC_WEIGHT: envNumber(0.7).pipe(z.number().min(0)),
  KEYWORD_WEIGHT: envNumber(0.3).pipe(z.number().min(0)),
  MAX_KEYWORDS_PER_CHUNK: envInt(20, 1),
  CACHE_RETENTION_HOURS: envNumber(1).pipe(z.number().positive()),
  CACHE_EVICTION_INTERVAL_MS: envInt(5 * 60 * 1000, 1000),
  EMBEDDING_PROVIDER_TIMEOUT_MS: envInt(15_000, 100),
  QUERY_EMBEDDING_TIMEOUT_MS: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().min(1).optional(),
  ),
  MAX_RETRY_ATTEMPTS: envInt(3, 1),
  RETRY_BASE_DELAY_MS: envInt(250, 0),
  RETRY_MAX_DELAY_MS: envInt(4_000, 0),
  EMBEDDING_BREAKER_THRESHOLD: envInt(3, 0),
  EMBEDDING_BREAKER_COOLDOWN_MS: envInt(30_000, 0),
  RESULT_OVER_FETCH_MULTIPLIER: envInt(3, 1),
  EMBEDDING_CONCURRENCY: envInt(4, 1),
  EMBEDDING_BATCH_SIZE: envInt(32, 1),
  EMBEDDING_CACHE_ENTRIES: envInt(5_000, 0),
  LEG_TIMEOUT_MS: envInt(10_000, 10),
  CONTEXT_WINDOW_CHARS: envInt(200, 20),
  MAX_QUERY_CHARS: envInt(500, 1),
  MAX_DOCUMENT_CHARS: envInt(5_000_000, 1),
  MAX_SEARCH_RESULTS: envInt(50, 1),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  EMBEDDING_MODEL: z.string().trim().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: envInt(1536, 1),
  LOCAL_EMBEDDING_DIM: envInt(384, 8),
  DATABASE_URL: optionalString,
  INDEX_STORE: z.enum(["pg", "memory"]).default("pg"),
  PORT: envInt(5055, 0),
});

export type SearchWeights = {
  semantic: number;
  keyword: number;
};

export type RetrievalConfig = {
  chunkSize: number;
  chunkOverlap: number;
  weights: SearchWeights;
  maxKeywordsPerChunk: number;
  cacheRetentionHours: number;
  cacheEvictionIntervalMs: number;
  embeddingProviderTimeoutMs: number;
  /** Deadline for one primary call while embedding a query; the rest of the leg budget is left to the fallback. */
  queryEmbeddingTimeoutMs: number;
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  breakerThreshold: number;
  breakerCooldownMs: number;
  overFetchMultiplier: number;
  embeddingConcurrency: number;
  embeddingBatchSize: number;
  embeddingCacheEntries: number;
  legTimeoutMs: number;
  contextWindowChars: number;
  maxQueryChars: number;
  maxDocumentChars: number;
  maxResults: number;
  openai: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    dimensions: number;
  };
  localEmbeddingDim: number;
  databaseUrl?: string;
  indexStore: "pg" | "memory";
  port: number;
};

/** Scales the pair so it sums to 1; fused scores stay in [0, 1] whatever the inputs. */
export const normalizeWeights = (semantic: number, keyword: number): SearchWeights => {
  const total = semantic + keyword;
  if (!Number.isFinite(total) || total <= 0) {
    throw new ValidationError("search weights must have a positive sum", [
      `semantic=${semantic}`,
      `keyword=${keyword}`,
    ]);
  }
  return { semantic: semantic / total, keyword: keyword / total };
};

export const readRetrievalConfig = (
  env: Record<string, string | undefined> = process.env,
): RetrievalConfig => {
  const parsed = RetrievalEnv.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError("invalid retrieval configuration", issues);
  }
  const cfg = parsed.data;
  if (cfg.CHUNK_OVERLAP >= cfg.CHUNK_SIZE) {
    throw new ValidationError("invalid retrieval configuration", [
      `CHUNK_OVERLAP (${cfg.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${cfg.CHUNK_SIZE})`,
    ]);
  }
  const queryEmbeddingTimeoutMs =
    cfg.QUERY_EMBEDDING_TIMEOUT_MS ??
    Math.max(1, Math.min(cfg.EMBEDDING_PROVIDER_TIMEOUT_MS, Math.floor(cfg.LEG_TIMEOUT_MS / 2)));
  if (queryEmbeddingTimeoutMs >= cfg.LEG_TIMEOUT_MS) {
    throw new ValidationError("invalid retrieval configuration", [
      `QUERY_EMBEDDING_TIMEOUT_MS (${queryEmbeddingTimeoutMs}) must be smaller than LEG_TIMEOUT_MS (${cfg.LEG_TIMEOUT_MS})`,
    ]);
  }

  return {
    chunkSize: cfg.CHUNK_SIZE,
    chunkOverlap: cfg.CHUNK_OVERLAP,
    weights: normalizeWeights(cfg.SEMANTIC_WEIGHT, cfg.KEYWORD_WEIGHT),
    maxKeywordsPerChunk: cfg.MAX_KEYWORDS_PER_CHUNK,
    cacheRetentionHours: cfg.CACHE_RETENTION_HOURS,
    cacheEvictionIntervalMs: cfg.CACHE_EVICTION_INTERVAL_MS,
    embeddingProviderTimeoutMs: cfg.EMBEDDING_PROVIDER_TIMEOUT_MS,
    queryEmbeddingTimeoutMs,
    maxRetryAttempts: cfg.MAX_RETRY_ATTEMPTS,
    retryBaseDelayMs: cfg.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: Math.max(cfg.RETRY_MAX_DELAY_MS, cfg.RETRY_BASE_DELAY_MS),
    breakerThreshold: cfg.EMBEDDING_BREAKER_THRESHOLD,
    breakerCooldownMs: cfg.EMBEDDING_BREAKER_COOLDOWN_MS,
    overFetchMultiplier: cfg.RESULT_OVER_FETCH_MULTIPLIER,
    embeddingConcurrency: cfg.EMBEDDING_CONCURRENCY,
    embeddingBatchSize: cfg.EMBEDDING_BATCH_SIZE,
    embeddingCacheEntries: cfg.EMBEDDING_CACHE_ENTRIES,
    legTimeoutMs: cfg.LEG_TIMEOUT_MS,
    contextWindowChars: cfg.CONTEXT_WINDOW_CHARS,
    maxQueryChars: cfg.MAX_QUERY_CHARS,
    maxDocumentChars: cfg.MAX_DOCUMENT_CHARS,
    maxResults: cfg.MAX_SEARCH_RESULTS,
    openai: {
      apiKey: cfg.OPENAI_API_KEY,
      baseUrl: cfg.OPENAI_BASE_URL,
      model: cfg.EMBEDDING_MODEL,
      dimensions: cfg.EMBEDDING_DIMENSIONS,
    },
    localEmbeddingDim: cfg.LOCAL_EMBEDDING_DIM,
    databaseUrl: cfg.DATABASE_URL,
    indexStore: cfg.INDEX_STORE,
    port: cfg.PORT,
  };
};
