import type { TScoredResult, TSearchMode } from "@shared/retrieval";
import { createLogger } from "../../utils/log";
import { errorMessage } from "./errors";

const log = createLogger("search-cache");

export type CachePayload = {
  queryText: string;
  mode: TSearchMode;
  results: TScoredResult[];
};

export type CacheEntry = CachePayload & {
  key: string;
  resultCount: number;
  createdAt: string;
  lastAccessedAt: string;
};

/**
 * Ranked lists keyed by query fingerprint. `get` refreshes the last access time;
 * eviction looks at last access only. Implementations report failures as CacheError.
 */
export interface SearchCache {
  get(key: string): Promise<CacheEntry | null>;
  put(key: string, payload: CachePayload): Promise<void>;
  /** Removes entries not read within `retentionMs`; returns how many went. */
  evictExpired(retentionMs: number): Promise<number>;
  size(): Promise<number>;
  clear(): Promise<void>;
}

/**
 * Counter bumped after every change to the indexed chunks. It is part of the cache
 * key, and a result computed under an older value is never written back.
 */
export class IndexGeneration {
  private value = 0;

  current(): number {
    return this.value;
  }

  bump(): number {
    this.value += 1;
    return this.value;
  }
}

export class MemorySearchCache implements SearchCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    entry.lastAccessedAt = new Date(this.now()).toISOString();
    return structuredClone(entry);
  }

  async put(key: string, payload: CachePayload): Promise<void> {
    const stamp = new Date(this.now()).toISOString();
    this.entries.set(key, {
      ...structuredClone(payload),
      key,
      resultCount: payload.results.length,
      createdAt: stamp,
      lastAccessedAt: stamp,
    });
  }

  async evictExpired(retentionMs: number): Promise<number> {
    const cutoff = this.now() - retentionMs;
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (Date.parse(entry.lastAccessedAt) < cutoff) {
        this.entries.delete(key);
        evicted += 1;
      }
    }
    return evicted;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

/** Periodic eviction; the timer is unref'd so it never keeps the process alive. */
export function startCacheJanitor(cache: SearchCache, retentionMs: number, intervalMs: number): () => void {
  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    cache
      .evictExpired(retentionMs)
      .then((evicted) => {
        if (evicted > 0) log.info(`evicted ${evicted} cached result list(s)`);
      })
      .catch((error: unknown) => {
        log.warn(`eviction pass failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
