import {
  SearchMode,
  type DegradedLeg,
  type SearchLeg,
  type SearchResponse,
  type SearchState,
  type TEmbeddingSource,
  type TScoredResult,
  type TSearchMode,
} from "@shared/retrieval";
import type { RetrievalConfig } from "../../config/retrieval";
import { metrics, type SearchOutcome } from "../../metrics";
import { abortReason, isAbortError, throwIfAborted, TimeoutError, withTimeout } from "../../utils/abort";
import { sha256Hex } from "../../utils/hash";
import { createLogger } from "../../utils/log";
import type { EmbeddingService } from "../embeddings/embedding-service";
import {
  CacheError,
  EmptyIndexError,
  errorMessage,
  NotFoundError,
  ProviderError,
  RetrievalError,
  StoreError,
  ValidationError,
} from "./errors";
import { buildContext, fuseScores, matchedTerms, rankResults, weightsForMode } from "./fusion";
import type { IndexStore, ScoredChunkId } from "./index-store";
import { extractKeywords } from "./keywords";
import type { IndexGeneration, SearchCache } from "./search-cache";
import { normalizeQuery } from "./text-normalize";

const log = createLogger("search");

const MAX_QUERY_TERMS = 32;
const MIN_SUGGEST_CHARS = 2;

export type SearchInput = {
  query: string;
  mode?: string;
  limit?: number;
  signal?: AbortSignal;
};

export type SearchRequest = {
  query: string;
  mode: TSearchMode;
  limit: number;
};

type Computation = {
  results: TScoredResult[];
  degraded: DegradedLeg[];
  embeddingSource: TEmbeddingSource | null;
  states: SearchState[];
};

type Inflight = {
  promise: Promise<Computation>;
  controller: AbortController;
  waiters: number;
};

type LegOutcome = { hits: ScoredChunkId[]; degraded?: DegradedLeg };

export type OrchestratorDeps = {
  config: RetrievalConfig;
  store: IndexStore;
  cache: SearchCache;
  embeddings: EmbeddingService;
  generation: IndexGeneration;
};

const outcomeOf = (error: unknown): SearchOutcome => {
  if (error instanceof ValidationError) return "invalid";
  if (error instanceof EmptyIndexError) return "empty_index";
  if (isAbortError(error)) return "aborted";
  return "error";
};

/**
 * Validates, consults the cache, fans out to the semantic and keyword legs, fuses and
 * caches. Identical concurrent queries share one computation.
 */
export class SearchOrchestrator {
  private readonly inflight = new Map<string, Inflight>();

  constructor(private readonly deps: OrchestratorDeps) {}

  validate(input: SearchInput): SearchRequest {
    const { maxQueryChars, maxResults } = this.deps.config;
    const issues: string[] = [];
    const query = typeof input.query === "string" ? input.query.trim() : "";
    if (!query) issues.push("query must not be empty");
    if (query.length > maxQueryChars) issues.push(`query must be at most ${maxQueryChars} characters`);

    const mode = SearchMode.safeParse(input.mode ?? "hybrid");
    if (!mode.success) issues.push(`mode must be one of ${SearchMode.options.join(", ")}`);

    const limit = input.limit ?? 10;
    if (!Number.isInteger(limit) || limit < 1 || limit > maxResults) {
      issues.push(`limit must be an integer between 1 and ${maxResults}`);
    }

    if (issues.length > 0 || !mode.success) {
      throw new ValidationError("invalid search request", issues);
    }
    return { query, mode: mode.data, limit };
  }

  /** Cache key over the normalized query, mode, limit and everything that shapes the results. */
  fingerprint(request: SearchRequest, generation = this.deps.generation.current()): string {
    const { weights, overFetchMultiplier, contextWindowChars } = this.deps.config;
    const signature = [
      weights.semantic.toFixed(6),
      weights.keyword.toFixed(6),
      this.deps.embeddings.primarySpace,
      overFetchMultiplier,
      contextWindowChars,
      generation,
    ].join("|");
    return sha256Hex([normalizeQuery(request.query), request.mode, request.limit, signature].join("\u0000"));
  }

  async search(input: SearchInput): Promise<SearchResponse> {
    const started = performance.now();
    let mode = typeof input.mode === "string" ? input.mode : "hybrid";
    try {
      const request = this.validate(input);
      mode = request.mode;
      throwIfAborted(input.signal);
      const generation = this.deps.generation.current();
      const key = this.fingerprint(request, generation);

      const hit = await this.lookup(key);
      if (hit) {
        metrics.recordSearch(mode, "cached", performance.now() - started);
        return {
          ...request,
          results: hit,
          cached: true,
          degraded: [],
          embeddingSource: null,
          states: ["received", "returned"],
        };
      }

      const computed = await this.join(key, request, generation, input.signal);
      metrics.recordSearch(mode, "ok", performance.now() - started);
      return {
        ...request,
        results: computed.results,
        cached: false,
        degraded: computed.degraded,
        embeddingSource: computed.embeddingSource,
        states: ["received", ...computed.states],
      };
    } catch (error) {
      metrics.recordSearch(mode, outcomeOf(error), performance.now() - started);
      throw error;
    }
  }

  /** Chunks of other documents closest to the document's first chunk, best chunk per document. */
  async similarDocuments(documentId: string, limit: number, signal?: AbortSignal): Promise<TScoredResult[]> {
    const { store, embeddings, config } = this.deps;
    if (!Number.isInteger(limit) || limit < 1 || limit > config.maxResults) {
      throw new ValidationError("invalid similar-documents request", [
        `limit must be an integer between 1 and ${config.maxResults}`,
      ]);
    }
    const document = await store.getDocument(documentId);
    if (!document) throw new NotFoundError(`document ${documentId} not found`);
    const [seed] = await store.listDocumentChunks(documentId);
    if (!seed) return [];

    let vector = seed.embedding;
    let space = seed.embeddingSpace;
    if (!vector || !space) {
      const embedded = await embeddings.embedQuery(seed.text, signal);
      if (!embedded) throw new ProviderError(embeddings.primary.id, "no vector available for the seed chunk", { retryable: true });
      vector = embedded.vector;
      space = embedded.space;
    }

    const hits = await store.nearestNeighbors(vector, limit * config.overFetchMultiplier * 4, space, {
      excludeDocumentId: documentId,
      signal,
    });
    const bestPerDocument: ScoredChunkId[] = [];
    const chunks = await store.getChunks(hits.map((hit) => hit.chunkId));
    const documentOf = new Map(chunks.map((chunk) => [chunk.id, chunk.documentId]));
    const seen = new Set<string>();
    for (const hit of hits) {
      const owner = documentOf.get(hit.chunkId);
      if (!owner || seen.has(owner)) continue;
      seen.add(owner);
      bestPerDocument.push(hit);
    }

    const candidates = bestPerDocument.map((hit) => ({
      chunkId: hit.chunkId,
      semanticScore: hit.score,
      keywordScore: 0,
      fusedScore: hit.score,
    }));
    return rankResults(candidates, chunks, limit, (chunk) => ({
      matchedKeywords: seed.keywords.filter((term) => chunk.keywords.includes(term)),
      context: buildContext(chunk.text, seed.keywords, config.contextWindowChars),
    }));
  }

  /** Indexed terms containing the partial query; empty below two characters. */
  async suggest(partial: string, limit = 10): Promise<string[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("invalid suggest request", ["limit must be a positive integer"]);
    }
    const fragment = normalizeQuery(partial).replace(/[^\p{L}\p{N}]+/gu, "");
    if (fragment.length < MIN_SUGGEST_CHARS) return [];
    const bounded = Math.max(1, Math.min(limit, this.deps.config.maxResults));
    return this.deps.store.suggestTerms(fragment, bounded);
  }

  private async lookup(key: string): Promise<TScoredResult[] | null> {
    try {
      const entry = await this.deps.cache.get(key);
      metrics.recordCacheLookup(entry ? "hit" : "miss");
      return entry ? entry.results : null;
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      metrics.recordCacheLookup("error");
      log.warn(`cache lookup failed, treating as miss: ${error.message}`);
      return null;
    }
  }

  private join(key: string, request: SearchRequest, generation: number, signal?: AbortSignal): Promise<Computation> {
    let entry = this.inflight.get(key);
    if (entry) {
      metrics.incrementCoalesced();
    } else {
      const controller = new AbortController();
      const promise = this.compute(key, request, generation, controller.signal);
      const created: Inflight = { promise, controller, waiters: 0 };
      entry = created;
      this.inflight.set(key, created);
      promise
        .catch((error: unknown) => {
          log.debug(`computation for ${key.slice(0, 12)} ended with ${errorMessage(error)}`);
        })
        .finally(() => {
          if (this.inflight.get(key) === created) this.inflight.delete(key);
        });
    }
    entry.waiters += 1;
    return this.awaitShared(entry, signal);
  }

  private awaitShared(entry: Inflight, signal?: AbortSignal): Promise<Computation> {
    if (!signal) return entry.promise;
    if (signal.aborted) {
      this.release(entry, signal);
      return Promise.reject(abortReason(signal));
    }
    return new Promise<Computation>((resolve, reject) => {
      const onAbort = () => {
        this.release(entry, signal);
        reject(abortReason(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      entry.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  // The shared computation stops only once nobody is left waiting for it.
  private release(entry: Inflight, signal: AbortSignal): void {
    entry.waiters -= 1;
    if (entry.waiters <= 0) entry.controller.abort(abortReason(signal));
  }

  private async compute(
    key: string,
    request: SearchRequest,
    generation: number,
    signal: AbortSignal,
  ): Promise<Computation> {
    const { store, cache, config } = this.deps;
    const states: SearchState[] = [];
    try {
      const counts = await store.counts();
      if (counts.chunks === 0) throw new EmptyIndexError();
      throwIfAborted(signal);

      const wantSemantic = request.mode !== "keyword";
      const wantKeyword = request.mode !== "semantic";
      const queryTerms = extractKeywords(request.query, MAX_QUERY_TERMS);
      const k = request.limit * config.overFetchMultiplier;
      const query: { source: TEmbeddingSource | null; embedded: boolean } = { source: null, embedded: false };

      if (wantSemantic) states.push("embedding");
      states.push("retrieving");

      const legs = new AbortController();
      const onAbort = () => legs.abort(abortReason(signal));
      signal.addEventListener("abort", onAbort, { once: true });
      const [semantic, keyword] = await Promise.all([
        wantSemantic
          ? this.runLeg(
              "semantic",
              legs,
              async (legSignal) => {
                const embedded = await this.deps.embeddings.embedQuery(request.query, legSignal);
                query.embedded = true;
                if (!embedded) return null;
                query.source = embedded.source;
                return store.nearestNeighbors(embedded.vector, k, embedded.space, { signal: legSignal });
              },
              // Out of time before a query vector existed: the providers failed, not the store.
              () => (query.embedded ? "timeout" : "embedding_unavailable"),
            )
          : Promise.resolve<LegOutcome>({ hits: [] }),
        wantKeyword
          ? this.runLeg("keyword", legs, (legSignal) => store.keywordSearch(queryTerms, k, { signal: legSignal }))
          : Promise.resolve<LegOutcome>({ hits: [] }),
      ]).finally(() => signal.removeEventListener("abort", onAbort));

      const degraded = [semantic.degraded, keyword.degraded].flatMap((leg) => (leg ? [leg] : []));
      const requested = Number(wantSemantic) + Number(wantKeyword);
      if (degraded.length === requested) {
        const timedOut = degraded.filter((leg) => leg.reason === "timeout");
        if (timedOut.length > 0) {
          throw new StoreError("search", new TimeoutError(`${timedOut.map((leg) => leg.leg).join(" and ")} leg`, config.legTimeoutMs));
        }
        throw new ProviderError(this.deps.embeddings.primary.id, "query embedding unavailable", { retryable: true });
      }

      states.push("fusing");
      const candidates = fuseScores(semantic.hits, keyword.hits, weightsForMode(request.mode, config.weights));
      const chunks = await store.getChunks(candidates.map((candidate) => candidate.chunkId));
      throwIfAborted(signal);
      const results = rankResults(candidates, chunks, request.limit, (chunk) => ({
        matchedKeywords: matchedTerms(chunk.text, queryTerms),
        context: buildContext(chunk.text, queryTerms, config.contextWindowChars),
      }));

      const indexChanged = this.deps.generation.current() !== generation;
      if (indexChanged) log.debug(`index changed while computing ${key.slice(0, 12)}, not caching`);
      if (degraded.length === 0 && query.source !== "fallback" && !indexChanged) {
        try {
          await cache.put(key, { queryText: request.query, mode: request.mode, results });
          states.push("cached");
        } catch (error) {
          if (!(error instanceof CacheError)) throw error;
          log.warn(`cache write skipped: ${error.message}`);
        }
      }
      states.push("returned");
      return { results, degraded, embeddingSource: query.source, states };
    } catch (error) {
      states.push("failed");
      if (!(error instanceof RetrievalError) && !isAbortError(error)) {
        log.error(`search failed: ${errorMessage(error)}`);
        throw new StoreError("search", error);
      }
      throw error;
    }
  }

  private async runLeg(
    leg: SearchLeg,
    legs: AbortController,
    task: (signal: AbortSignal) => Promise<ScoredChunkId[] | null>,
    timeoutReason: () => DegradedLeg["reason"] = () => "timeout",
  ): Promise<LegOutcome> {
    try {
      const hits = await withTimeout(task, this.deps.config.legTimeoutMs, `${leg} leg`, legs.signal);
      if (hits === null) {
        metrics.recordDegradedLeg(leg, "embedding_unavailable");
        return { hits: [], degraded: { leg, reason: "embedding_unavailable" } };
      }
      return { hits };
    } catch (error) {
      if (error instanceof TimeoutError) {
        const reason = timeoutReason();
        metrics.recordDegradedLeg(leg, reason);
        log.warn(`${leg} leg timed out after ${error.timeoutMs}ms (${reason})`);
        return { hits: [], degraded: { leg, reason } };
      }
      legs.abort(error instanceof Error ? error : new Error(String(error)));
      if (error instanceof RetrievalError || isAbortError(error)) throw error;
      throw new StoreError(`${leg} leg`, error);
    }
  }
}
