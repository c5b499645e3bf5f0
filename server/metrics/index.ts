import type { Express, NextFunction, Request, Response } from "express";
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const searchesTotal = new Counter({
  name: "retrieval_searches_total",
  help: "Searches by mode and outcome",
  labelNames: ["mode", "outcome"],
  registers: [registry],
});

const searchLatency = new Histogram({
  name: "retrieval_search_latency_ms",
  help: "Search wall-clock latency in milliseconds",
  labelNames: ["mode", "outcome"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

const cacheLookupsTotal = new Counter({
  name: "retrieval_cache_lookups_total",
  help: "Search cache lookups by result",
  labelNames: ["result"],
  registers: [registry],
});

const coalescedSearchesTotal = new Counter({
  name: "retrieval_coalesced_searches_total",
  help: "Searches that joined an identical in-flight computation",
  registers: [registry],
});

const degradedLegsTotal = new Counter({
  name: "retrieval_degraded_legs_total",
  help: "Search legs that contributed nothing",
  labelNames: ["leg", "reason"],
  registers: [registry],
});

const embeddingCallsTotal = new Counter({
  name: "embedding_calls_total",
  help: "Embedding provider calls by provider and status",
  labelNames: ["provider", "status"],
  registers: [registry],
});

const embeddingFallbacksTotal = new Counter({
  name: "embedding_fallbacks_total",
  help: "Batches embedded by the local fallback provider",
  registers: [registry],
});

const embeddingLatency = new Histogram({
  name: "embedding_latency_ms",
  help: "Embedding provider latency in milliseconds",
  labelNames: ["provider", "status"],
  buckets: [5, 25, 50, 100, 250, 500, 1000, 2000, 5000, 15000],
  registers: [registry],
});

const documentsIngestedTotal = new Counter({
  name: "retrieval_documents_ingested_total",
  help: "Ingest outcomes by final document status",
  labelNames: ["status"],
  registers: [registry],
});

const chunksWrittenTotal = new Counter({
  name: "retrieval_chunks_written_total",
  help: "Chunks written to the index store",
  registers: [registry],
});

const poolJobsActive = new Gauge({
  name: "work_pool_jobs_active",
  help: "Active jobs per work pool",
  labelNames: ["pool"],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total HTTP requests processed by Express",
  labelNames: ["method", "route", "status"],
  registers: [registry],
});

const httpRequestDuration = new Histogram({
  name: "http_request_duration_ms",
  help: "HTTP request duration in milliseconds",
  labelNames: ["method", "route", "status"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});

export type SearchOutcome = "ok" | "cached" | "empty_index" | "invalid" | "error" | "aborted";

export const metrics = {
  recordSearch(mode: string, outcome: SearchOutcome, latencyMs: number): void {
    searchesTotal.inc({ mode, outcome });
    if (Number.isFinite(latencyMs) && latencyMs >= 0) {
      searchLatency.observe({ mode, outcome }, latencyMs);
    }
  },
  recordCacheLookup(result: "hit" | "miss" | "error"): void {
    cacheLookupsTotal.inc({ result });
  },
  incrementCoalesced(): void {
    coalescedSearchesTotal.inc();
  },
  recordDegradedLeg(leg: string, reason: string): void {
    degradedLegsTotal.inc({ leg, reason });
  },
  recordEmbeddingCall(provider: string, ok: boolean, latencyMs: number): void {
    const status = ok ? "ok" : "error";
    embeddingCallsTotal.inc({ provider, status });
    embeddingLatency.observe({ provider, status }, latencyMs);
  },
  incrementEmbeddingFallback(): void {
    embeddingFallbacksTotal.inc();
  },
  recordIngest(status: string, chunks: number): void {
    documentsIngestedTotal.inc({ status });
    if (chunks > 0) chunksWrittenTotal.inc(chunks);
  },
  setPoolActive(pool: string, value: number): void {
    poolJobsActive.set({ pool }, value);
  },
  observeHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const cleanRoute = route || "unknown";
    const status = Number.isFinite(statusCode) ? String(statusCode) : "0";
    httpRequestsTotal.inc({ method: method || "GET", route: cleanRoute, status });
    httpRequestDuration.observe({ method: method || "GET", route: cleanRoute, status }, durationMs);
  },
};

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const started = performance.now();
  res.on("finish", () => {
    const route = typeof req.route?.path === "string" ? `${req.baseUrl}${req.route.path}` : req.baseUrl;
    metrics.observeHttpRequest(req.method, route, res.statusCode, performance.now() - started);
  });
  next();
}

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
