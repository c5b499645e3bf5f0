import { Router, type Response } from "express";
import type { ChunkRecord } from "@shared/retrieval";
import { RetrievalError, ValidationError } from "../services/retrieval/errors";
import type { RetrievalContext } from "../services/retrieval/context";
import { isAbortError } from "../utils/abort";
import { createLogger } from "../utils/log";

const log = createLogger("routes");

const queryString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

// Absent stays undefined so the service default applies; anything unparsable becomes NaN and fails validation.
const queryInt = (value: unknown): number | undefined => {
  const raw = queryString(value)?.trim();
  if (raw === undefined || raw === "") return undefined;
  return /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
};

const publicChunk = ({ embedding, ...chunk }: ChunkRecord) => ({
  ...chunk,
  embeddingDim: embedding ? embedding.length : null,
});

export function sendError(res: Response, error: unknown): void {
  if (res.headersSent) return;
  if (error instanceof ValidationError) {
    res.status(error.status).json({ error: error.code, message: error.message, issues: error.issues });
    return;
  }
  if (error instanceof RetrievalError) {
    res.status(error.status).json({ error: error.code, message: error.message });
    return;
  }
  log.error(`unhandled error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  res.status(500).json({ error: "internal_error", message: "unexpected server error" });
}

/** Aborts when the client goes away before the response is written. */
const requestSignal = (res: Response): AbortSignal => {
  const controller = new AbortController();
  // The request emits "close" as soon as its body is read, so watch the response.
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
};

export function createRetrievalRouter(ctx: RetrievalContext): Router {
  const router = Router();

  router.post("/documents", async (req, res) => {
    try {
      const { document, created } = await ctx.ingest.ingest(req.body ?? {});
      res.status(created ? 201 : 200).json({ document, created });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/documents/:id", async (req, res) => {
    try {
      res.json({ document: await ctx.ingest.getDocument(req.params.id) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/documents/:id/chunks", async (req, res) => {
    try {
      const chunks = await ctx.ingest.documentChunks(req.params.id);
      res.json({ documentId: req.params.id, chunks: chunks.map(publicChunk) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete("/documents/:id", async (req, res) => {
    try {
      await ctx.ingest.deleteDocument(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post("/documents/:id/reprocess", async (req, res) => {
    try {
      res.json({ document: await ctx.ingest.reprocess(req.params.id) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/documents/:id/similar", async (req, res) => {
    try {
      const limit = queryInt(req.query.limit) ?? 5;
      const results = await ctx.search.similarDocuments(req.params.id, limit, requestSignal(res));
      res.json({ documentId: req.params.id, results });
    } catch (error) {
      if (isAbortError(error)) return;
      sendError(res, error);
    }
  });

  router.get("/search", async (req, res) => {
    try {
      const response = await ctx.search.search({
        query: queryString(req.query.q) ?? "",
        mode: queryString(req.query.mode) || undefined,
        limit: queryInt(req.query.limit),
        signal: requestSignal(res),
      });
      res.json(response);
    } catch (error) {
      if (isAbortError(error)) {
        log.debug("search abandoned by client");
        return;
      }
      sendError(res, error);
    }
  });

  router.get("/search/suggest", async (req, res) => {
    try {
      const partial = queryString(req.query.q) ?? "";
      const suggestions = await ctx.search.suggest(partial, queryInt(req.query.limit) ?? 10);
      res.json({ query: partial, suggestions });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/stats", async (_req, res) => {
    try {
      res.json(await ctx.stats());
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
