import type { Pool } from "pg";
import type { RetrievalStats } from "@shared/retrieval";
import type { RetrievalConfig } from "../../config/retrieval";
import { createPool } from "../../db/client";
import { PgIndexStore } from "../../db/retrieval";
import { PgSearchCache } from "../../db/search-cache";
import { createLogger } from "../../utils/log";
import { EmbeddingService } from "../embeddings/embedding-service";
import { HashEmbeddingProvider, OpenAIEmbeddingProvider, type EmbeddingProvider } from "../embeddings/providers";
import { CacheError } from "./errors";
import type { IndexStore } from "./index-store";
import { IngestService } from "./ingest";
import { MemoryIndexStore } from "./memory-store";
import { SearchOrchestrator } from "./orchestrator";
import { IndexGeneration, MemorySearchCache, startCacheJanitor, type SearchCache } from "./search-cache";

const log = createLogger("retrieval");

export type RetrievalContext = {
  config: RetrievalConfig;
  store: IndexStore;
  cache: SearchCache;
  embeddings: EmbeddingService;
  ingest: IngestService;
  search: SearchOrchestrator;
  stats(): Promise<RetrievalStats>;
  startJanitor(): () => void;
};

export type RetrievalOverrides = {
  pool?: Pool;
  store?: IndexStore;
  cache?: SearchCache;
  primary?: EmbeddingProvider;
  fallback?: EmbeddingProvider | null;
  random?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const defaultProviders = (config: RetrievalConfig): { primary: EmbeddingProvider; fallback: EmbeddingProvider | null } => {
  const local = new HashEmbeddingProvider(config.localEmbeddingDim);
  if (!config.openai.apiKey) {
    log.warn("OPENAI_API_KEY not set, embedding with the local hashed provider only");
    return { primary: local, fallback: null };
  }
  const remote = new OpenAIEmbeddingProvider({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model,
    dimensions: config.openai.dimensions,
  });
  return { primary: remote, fallback: local };
};

/**
 * Wires store, cache, embeddings and the two services from one config. Everything a
 * request touches hangs off the returned object; nothing is module-global.
 */
export function createRetrievalContext(config: RetrievalConfig, overrides: RetrievalOverrides = {}): RetrievalContext {
  const usePg = config.indexStore === "pg";
  const pool = overrides.pool ?? (usePg && (!overrides.store || !overrides.cache) ? createPool(config.databaseUrl) : undefined);
  const store = overrides.store ?? (pool ? new PgIndexStore(pool) : new MemoryIndexStore());
  const cache = overrides.cache ?? (pool ? new PgSearchCache(pool) : new MemorySearchCache());

  const defaults = overrides.primary ? null : defaultProviders(config);
  const primary = overrides.primary ?? defaults?.primary ?? new HashEmbeddingProvider(config.localEmbeddingDim);
  const fallback = overrides.fallback !== undefined ? overrides.fallback : (defaults?.fallback ?? null);

  const embeddings = new EmbeddingService(primary, fallback, {
    timeoutMs: config.embeddingProviderTimeoutMs,
    queryTimeoutMs: config.queryEmbeddingTimeoutMs,
    retry: {
      maxAttempts: config.maxRetryAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    breakerThreshold: config.breakerThreshold,
    breakerCooldownMs: config.breakerCooldownMs,
    batchSize: config.embeddingBatchSize,
    concurrency: config.embeddingConcurrency,
    cacheEntries: config.embeddingCacheEntries,
    random: overrides.random,
    wait: overrides.wait,
  });

  const deps = { config, store, cache, embeddings, generation: new IndexGeneration() };
  const ingest = new IngestService(deps);
  const search = new SearchOrchestrator(deps);

  const stats = async (): Promise<RetrievalStats> => {
    const counts = await store.counts();
    let cacheEntries = 0;
    try {
      cacheEntries = await cache.size();
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      log.warn(`cache size unavailable: ${error.message}`);
    }
    return {
      ...counts,
      cacheEntries,
      embeddings: {
        primary: embeddings.primarySpace,
        fallback: embeddings.fallbackSpace,
        cachedVectors: embeddings.cachedVectors(),
        breakerOpen: embeddings.breakerOpen(),
      },
    };
  };

  const startJanitor = () =>
    startCacheJanitor(cache, config.cacheRetentionHours * 60 * 60 * 1000, config.cacheEvictionIntervalMs);

  return { config, store, cache, embeddings, ingest, search, stats, startJanitor };
}
