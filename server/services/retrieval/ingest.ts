import {
  IngestRequest,
  type ChunkRecord,
  type TDocumentRecord,
  type TDocumentStatus,
  type TIngestRequest,
} from "@shared/retrieval";
import type { RetrievalConfig } from "../../config/retrieval";
import { metrics } from "../../metrics";
import { sha256Hex } from "../../utils/hash";
import { createLogger } from "../../utils/log";
import type { EmbeddedVector, EmbeddingService } from "../embeddings/embedding-service";
import { chunkText, type ChunkSpan } from "./chunker";
import { CacheError, errorMessage, NotFoundError, StoreError, ValidationError } from "./errors";
import type { IndexStore } from "./index-store";
import { extractKeywords } from "./keywords";
import type { IndexGeneration, SearchCache } from "./search-cache";
import { normalizeDocumentText } from "./text-normalize";

const log = createLogger("ingest");

const TRANSITIONS: Record<TDocumentStatus, readonly TDocumentStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: ["pending"],
  failed: ["pending"],
};

export const canTransition = (from: TDocumentStatus, to: TDocumentStatus): boolean => TRANSITIONS[from].includes(to);

export const documentIdFor = (normalizedText: string): string => sha256Hex(normalizedText).slice(0, 32);

export type IngestOutcome = {
  document: TDocumentRecord;
  created: boolean;
};

export type ProcessingInfo = {
  originalLength: number;
  cleanedLength: number;
  chunksCreated: number;
  processingMs: number;
  reusedVectors: number;
  fallbackVectors: number;
};

export type IngestDeps = {
  config: RetrievalConfig;
  store: IndexStore;
  cache: SearchCache;
  embeddings: EmbeddingService;
  generation: IndexGeneration;
};

const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length;

const readOriginalLength = (document: TDocumentRecord): number => {
  const processing = document.metadata.processing;
  if (processing && typeof processing === "object" && "originalLength" in processing) {
    const value = processing.originalLength;
    if (typeof value === "number") return value;
  }
  return document.text.length;
};

/**
 * Document lifecycle: normalize, chunk, embed, index. Documents are addressed by a
 * hash of their normalized text, so ingesting the same text twice is a no-op.
 */
export class IngestService {
  private readonly inflight = new Map<string, Promise<TDocumentRecord>>();

  constructor(private readonly deps: IngestDeps) {}

  async ingest(input: TIngestRequest): Promise<IngestOutcome> {
    const parsed = IngestRequest.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        "invalid document",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
      );
    }
    const request = parsed.data;
    if (request.text.length > this.deps.config.maxDocumentChars) {
      throw new ValidationError("invalid document", [
        `text must be at most ${this.deps.config.maxDocumentChars} characters`,
      ]);
    }
    const text = normalizeDocumentText(request.text, request.format);
    if (!text) {
      throw new ValidationError("invalid document", ["text must contain non-whitespace characters"]);
    }

    const id = documentIdFor(text);
    const running = this.inflight.get(id);
    if (running) {
      return { document: await running, created: false };
    }

    const outcome = { created: false };
    const work = (async () => {
      const existing = await this.deps.store.getDocument(id);
      if (existing?.status === "completed" || existing?.status === "processing") {
        return existing;
      }
      let document: TDocumentRecord;
      if (existing) {
        document = existing.status === "failed" ? await this.transition(existing, "pending") : existing;
      } else {
        const now = new Date().toISOString();
        document = {
          id,
          title: request.title,
          text,
          format: request.format,
          metadata: { ...request.metadata },
          status: "pending",
          chunkCount: 0,
          error: null,
          createdAt: now,
          updatedAt: now,
        };
        await this.deps.store.putDocument(document);
        outcome.created = true;
      }
      return this.process(document, request.text.length);
    })();

    const document = await this.track(id, work);
    return { document, created: outcome.created };
  }

  async reprocess(id: string): Promise<TDocumentRecord> {
    if (this.inflight.has(id)) {
      throw new ValidationError(`document ${id} is already being processed`);
    }
    // Registered before the first await so a concurrent ingest or reprocess sees it.
    const work = (async () => {
      let document = await this.requireDocument(id);
      if (document.status === "processing") {
        // Nothing in this process is working on it: an earlier run was interrupted.
        document = await this.transition(document, "failed", { error: "processing interrupted" });
      }
      const pending = await this.transition(document, "pending");
      return this.process(pending, readOriginalLength(document));
    })();
    return this.track(id, work);
  }

  async getDocument(id: string): Promise<TDocumentRecord> {
    return this.requireDocument(id);
  }

  async documentChunks(id: string): Promise<ChunkRecord[]> {
    await this.requireDocument(id);
    return this.deps.store.listDocumentChunks(id);
  }

  async deleteDocument(id: string): Promise<void> {
    const removed = await this.deps.store.deleteDocument(id);
    if (!removed) throw new NotFoundError(`document ${id} not found`);
    await this.invalidateCache("delete");
    log.info(`deleted ${id}`);
  }

  private async track(id: string, work: Promise<TDocumentRecord>): Promise<TDocumentRecord> {
    this.inflight.set(id, work);
    try {
      return await work;
    } finally {
      if (this.inflight.get(id) === work) this.inflight.delete(id);
    }
  }

  private async requireDocument(id: string): Promise<TDocumentRecord> {
    const document = await this.deps.store.getDocument(id);
    if (!document) throw new NotFoundError(`document ${id} not found`);
    return document;
  }

  private async transition(
    document: TDocumentRecord,
    to: TDocumentStatus,
    patch: { chunkCount?: number; error?: string | null; metadata?: Record<string, unknown> } = {},
  ): Promise<TDocumentRecord> {
    if (!canTransition(document.status, to)) {
      throw new ValidationError(`document ${document.id} cannot move from ${document.status} to ${to}`);
    }
    const updated = await this.deps.store.updateDocument(document.id, { ...patch, status: to });
    if (!updated) throw new NotFoundError(`document ${document.id} not found`);
    return updated;
  }

  private async process(document: TDocumentRecord, originalLength: number): Promise<TDocumentRecord> {
    const started = performance.now();
    const { config, store } = this.deps;
    let current = await this.transition(document, "processing", { error: null });
    let replaced = false;
    try {
      const spans = chunkText(current.text, { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
      const vectors = await this.embedSpans(spans);
      const createdAt = new Date().toISOString();
      const chunks: ChunkRecord[] = spans.map((span, index) => ({
        id: `${current.id}:${index}`,
        documentId: current.id,
        sequenceIndex: index,
        text: span.text,
        fingerprint: sha256Hex(span.text),
        embedding: vectors.items[index].vector,
        embeddingSpace: vectors.items[index].space,
        embeddingSource: vectors.items[index].source,
        keywords: extractKeywords(span.text, config.maxKeywordsPerChunk),
        wordCount: countWords(span.text),
        charCount: span.text.length,
        startOffset: span.start,
        endOffset: span.end,
        overlapChars: span.overlap,
        createdAt,
      }));
      await store.replaceChunks(current.id, chunks);
      replaced = true;

      const processing: ProcessingInfo = {
        originalLength,
        cleanedLength: current.text.length,
        chunksCreated: chunks.length,
        processingMs: Math.round(performance.now() - started),
        reusedVectors: vectors.reused,
        fallbackVectors: chunks.filter((chunk) => chunk.embeddingSource === "fallback").length,
      };
      current = await this.transition(current, "completed", {
        chunkCount: chunks.length,
        error: null,
        metadata: { ...current.metadata, processing },
      });
      await this.invalidateCache("ingest");
      metrics.recordIngest("completed", chunks.length);
      log.info(`indexed ${current.id} "${current.title}": ${chunks.length} chunk(s) in ${processing.processingMs}ms`);
      return current;
    } catch (error) {
      log.error(`processing ${current.id} failed: ${errorMessage(error)}`);
      metrics.recordIngest("failed", 0);
      await this.markFailed(current, error);
      if (replaced) await this.invalidateCache("failed ingest");
      throw error;
    }
  }

  private async markFailed(document: TDocumentRecord, error: unknown): Promise<void> {
    try {
      await this.transition(document, "failed", { error: errorMessage(error).slice(0, 1000) });
    } catch (markError) {
      log.error(`could not record failure for ${document.id}: ${errorMessage(markError)}`);
    }
  }

  /** Stored vectors are reused for unchanged chunk text; the rest go to the embedding service. */
  private async embedSpans(spans: ChunkSpan[]): Promise<{ items: EmbeddedVector[]; reused: number }> {
    const { store, embeddings } = this.deps;
    const space = embeddings.primarySpace;
    const known = await store.findEmbeddings(
      spans.map((span) => sha256Hex(span.text)),
      space,
    );
    const items = spans.map((span): EmbeddedVector | undefined => {
      const vector = known.get(sha256Hex(span.text));
      return vector ? { vector, source: "primary", space } : undefined;
    });
    const missing = items.flatMap((item, index) => (item ? [] : [index]));
    if (missing.length > 0) {
      const fresh = await embeddings.embedMany(missing.map((index) => spans[index].text));
      missing.forEach((index, position) => {
        items[index] = fresh[position];
      });
    }
    return {
      items: items.map((item, index) => {
        if (!item) throw new StoreError("embed", `no vector for chunk ${index}`);
        return item;
      }),
      reused: spans.length - missing.length,
    };
  }

  private async invalidateCache(reason: string): Promise<void> {
    this.deps.generation.bump();
    try {
      await this.deps.cache.clear();
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      log.warn(`cache clear after ${reason} failed: ${error.message}`);
    }
  }
}
