import type { TEmbeddingSource } from "@shared/retrieval";
import { metrics } from "../../metrics";
import { mapOnPool, WorkPool } from "../../queue";
import { isAbortError, TimeoutError, withTimeout } from "../../utils/abort";
import { sha256Hex } from "../../utils/hash";
import { createLogger } from "../../utils/log";
import { errorMessage, ProviderError } from "../retrieval/errors";
import { createCircuitBreaker, type CircuitBreaker } from "./circuit-breaker";
import { checkVectors, embeddingSpace, type EmbeddingProvider } from "./providers";
import { retryWithBackoff, type RetryPolicy } from "./retry";

const log = createLogger("embeddings");

export type EmbeddedVector = {
  vector: number[];
  source: TEmbeddingSource;
  space: string;
};

/** Per-call deadline and attempt count for one tier. */
export type CallBudget = {
  timeoutMs: number;
  maxAttempts: number;
};

export type EmbeddingServiceOptions = {
  timeoutMs: number;
  /** Per-call deadline for query embedding; one primary attempt, then the fallback. */
  queryTimeoutMs: number;
  retry: RetryPolicy;
  breakerThreshold: number;
  breakerCooldownMs: number;
  batchSize: number;
  concurrency: number;
  cacheEntries: number;
  random?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

/**
 * Primary provider guarded by timeout, retry and a circuit breaker, with an optional
 * fallback tier. Vectors are cached per space and text fingerprint.
 */
export class EmbeddingService {
  private readonly breaker: CircuitBreaker;
  private readonly pool: WorkPool;
  private readonly cache = new Map<string, number[]>();

  constructor(
    readonly primary: EmbeddingProvider,
    readonly fallback: EmbeddingProvider | null,
    private readonly options: EmbeddingServiceOptions,
  ) {
    this.breaker = createCircuitBreaker({
      name: primary.id,
      failureThreshold: fallback ? options.breakerThreshold : 0,
      cooldownMs: options.breakerCooldownMs,
      now: options.now,
    });
    this.pool = new WorkPool("embeddings", options.concurrency);
  }

  get primarySpace(): string {
    return embeddingSpace(this.primary);
  }

  get fallbackSpace(): string | null {
    return this.fallback ? embeddingSpace(this.fallback) : null;
  }

  breakerOpen(): boolean {
    return this.breaker.isOpen();
  }

  cachedVectors(): number {
    return this.cache.size;
  }

  /** One batch through primary then fallback. Throws ProviderError when no tier succeeds. */
  async embedBatch(texts: string[], signal?: AbortSignal, budget?: CallBudget): Promise<EmbeddedVector[]> {
    if (texts.length === 0) return [];
    const calls = budget ?? { timeoutMs: this.options.timeoutMs, maxAttempts: this.options.retry.maxAttempts };
    let primaryError: unknown;

    if (!this.breaker.isOpen()) {
      try {
        const vectors = await this.embedWith(this.primary, texts, signal, calls);
        this.breaker.recordSuccess();
        return this.tag(vectors, "primary", this.primarySpace);
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          // A caller deadline that ran out on the primary still counts against it.
          if (error instanceof TimeoutError) this.breaker.recordFailure(error);
          throw error;
        }
        this.breaker.recordFailure(error);
        primaryError = error;
      }
    } else {
      primaryError = new ProviderError(this.primary.id, "circuit open", { retryable: true });
    }

    const fallback = this.fallback;
    if (!fallback) {
      throw this.asProviderError(this.primary, primaryError);
    }
    log.warn(`${this.primary.id} unavailable, embedding ${texts.length} text(s) with ${fallback.id}: ${errorMessage(primaryError)}`);
    metrics.incrementEmbeddingFallback();
    try {
      const vectors = await this.embedWith(fallback, texts, signal, calls);
      return this.tag(vectors, "fallback", embeddingSpace(fallback));
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) throw error;
      throw this.asProviderError(fallback, error);
    }
  }

  /** Splits `texts` into batches run on the bounded pool; output order matches input. */
  async embedMany(texts: string[], signal?: AbortSignal): Promise<EmbeddedVector[]> {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push(texts.slice(i, i + this.options.batchSize));
    }
    const results = await mapOnPool(this.pool, batches, (batch) => this.embedBatch(batch, signal));
    return results.flat();
  }

  /** Query vector, or null when every tier failed so the caller can go keyword-only. */
  async embedQuery(text: string, signal?: AbortSignal): Promise<EmbeddedVector | null> {
    try {
      const [embedded] = await this.embedBatch([text], signal, {
        timeoutMs: this.options.queryTimeoutMs,
        maxAttempts: 1,
      });
      return embedded ?? null;
    } catch (error) {
      if (error instanceof ProviderError) {
        log.warn(`query embedding unavailable: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  private tag(vectors: number[][], source: TEmbeddingSource, space: string): EmbeddedVector[] {
    return vectors.map((vector) => ({ vector, source, space }));
  }

  private async embedWith(
    provider: EmbeddingProvider,
    texts: string[],
    signal: AbortSignal | undefined,
    budget: CallBudget,
  ): Promise<number[][]> {
    const space = embeddingSpace(provider);
    const keys = texts.map((text) => `${space}:${sha256Hex(text)}`);
    const out: Array<number[] | undefined> = keys.map((key) => this.cacheGet(key));
    const missing = out.flatMap((vector, index) => (vector ? [] : [index]));

    if (missing.length > 0) {
      const batch = missing.map((index) => texts[index]);
      const vectors = await retryWithBackoff(
        () => this.callOnce(provider, batch, budget.timeoutMs, signal),
        { ...this.options.retry, maxAttempts: budget.maxAttempts },
        {
          signal,
          random: this.options.random,
          wait: this.options.wait,
          onTransition: (state, attempt, detail) => {
            if (state === "backing_off") {
              log.debug(`${provider.id} attempt ${attempt} failed, retrying in ${detail?.delayMs ?? 0}ms`);
            }
          },
        },
      );
      missing.forEach((index, position) => {
        out[index] = vectors[position];
        this.cachePut(keys[index], vectors[position]);
      });
    }

    return out.map((vector, index) => {
      if (!vector) {
        throw new ProviderError(provider.id, `no vector produced for input ${index}`, { retryable: false });
      }
      return vector;
    });
  }

  private async callOnce(
    provider: EmbeddingProvider,
    texts: string[],
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<number[][]> {
    const started = performance.now();
    try {
      const vectors = await withTimeout(
        (callSignal) => provider.embed(texts, callSignal),
        timeoutMs,
        `${provider.id} embed`,
        signal,
      );
      const checked = checkVectors(provider, texts, vectors);
      metrics.recordEmbeddingCall(provider.id, true, performance.now() - started);
      return checked;
    } catch (error) {
      metrics.recordEmbeddingCall(provider.id, false, performance.now() - started);
      throw error;
    }
  }

  private asProviderError(provider: EmbeddingProvider, error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;
    return new ProviderError(provider.id, errorMessage(error), { retryable: false, cause: error });
  }

  private cacheGet(key: string): number[] | undefined {
    const hit = this.cache.get(key);
    if (hit) {
      this.cache.delete(key);
      this.cache.set(key, hit);
    }
    return hit;
  }

  private cachePut(key: string, vector: number[]): void {
    if (this.options.cacheEntries <= 0) return;
    this.cache.set(key, vector);
    while (this.cache.size > this.options.cacheEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
