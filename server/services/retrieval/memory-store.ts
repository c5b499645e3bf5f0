import type { ChunkRecord, TDocumentRecord } from "@shared/retrieval";
import { throwIfAborted } from "../../utils/abort";
import { cosineSimilarity } from "../embeddings/vector";
import {
  byScoreThenId,
  byTotalThenTerm,
  emptyStatusCounts,
  type DocumentPatch,
  type IndexCounts,
  type IndexStore,
  type NeighborOptions,
  type ScoredChunkId,
  type TermTotal,
} from "./index-store";
import { termCounts } from "./keywords";

type StoredChunk = ChunkRecord & { terms: Map<string, number> };

const clone = <T>(value: T): T => structuredClone(value);

const stripInternal = ({ terms: _terms, ...chunk }: StoredChunk): ChunkRecord => clone(chunk);

/** Process-local store; used by `INDEX_STORE=memory` and by tests. */
export class MemoryIndexStore implements IndexStore {
  readonly kind = "memory" as const;
  private readonly documents = new Map<string, TDocumentRecord>();
  private readonly chunks = new Map<string, StoredChunk>();

  async putDocument(document: TDocumentRecord): Promise<void> {
    this.documents.set(document.id, clone(document));
  }

  async getDocument(id: string): Promise<TDocumentRecord | null> {
    const found = this.documents.get(id);
    return found ? clone(found) : null;
  }

  async updateDocument(id: string, patch: DocumentPatch): Promise<TDocumentRecord | null> {
    const current = this.documents.get(id);
    if (!current) return null;
    const next: TDocumentRecord = { ...current, ...clone(patch), updatedAt: new Date().toISOString() };
    this.documents.set(id, next);
    return clone(next);
  }

  async deleteDocument(id: string): Promise<boolean> {
    this.dropChunks(id);
    return this.documents.delete(id);
  }

  async upsertChunk(chunk: ChunkRecord): Promise<void> {
    this.chunks.set(chunk.id, { ...clone(chunk), terms: termCounts(chunk.text) });
  }

  async replaceChunks(documentId: string, chunks: ChunkRecord[]): Promise<void> {
    this.dropChunks(documentId);
    for (const chunk of chunks) {
      await this.upsertChunk(chunk);
    }
  }

  async getChunk(id: string): Promise<ChunkRecord | null> {
    const found = this.chunks.get(id);
    return found ? stripInternal(found) : null;
  }

  async getChunks(ids: string[]): Promise<ChunkRecord[]> {
    return ids.flatMap((id) => {
      const found = this.chunks.get(id);
      return found ? [stripInternal(found)] : [];
    });
  }

  async listDocumentChunks(documentId: string): Promise<ChunkRecord[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex)
      .map(stripInternal);
  }

  async nearestNeighbors(
    vector: number[],
    k: number,
    space: string,
    options: NeighborOptions = {},
  ): Promise<ScoredChunkId[]> {
    throwIfAborted(options.signal);
    const scored: ScoredChunkId[] = [];
    for (const chunk of this.chunks.values()) {
      if (!chunk.embedding || chunk.embeddingSpace !== space) continue;
      if (options.excludeDocumentId && chunk.documentId === options.excludeDocumentId) continue;
      scored.push({ chunkId: chunk.id, score: cosineSimilarity(vector, chunk.embedding) });
    }
    return scored.sort(byScoreThenId).slice(0, Math.max(0, k));
  }

  async keywordSearch(terms: string[], k: number, options: { signal?: AbortSignal } = {}): Promise<ScoredChunkId[]> {
    throwIfAborted(options.signal);
    if (terms.length === 0) return [];
    const scored: ScoredChunkId[] = [];
    for (const chunk of this.chunks.values()) {
      let score = 0;
      for (const term of new Set(terms)) {
        score += chunk.terms.get(term) ?? 0;
      }
      if (score > 0) scored.push({ chunkId: chunk.id, score });
    }
    return scored.sort(byScoreThenId).slice(0, Math.max(0, k));
  }

  async suggestTerms(fragment: string, limit: number): Promise<string[]> {
    const totals = new Map<string, number>();
    for (const chunk of this.chunks.values()) {
      for (const [term, freq] of chunk.terms) {
        if (term.includes(fragment)) totals.set(term, (totals.get(term) ?? 0) + freq);
      }
    }
    const ranked: TermTotal[] = [...totals].map(([term, total]) => ({ term, total }));
    return ranked.sort(byTotalThenTerm).slice(0, Math.max(0, limit)).map((entry) => entry.term);
  }

  async findEmbeddings(fingerprints: string[], space: string): Promise<Map<string, number[]>> {
    const wanted = new Set(fingerprints);
    const found = new Map<string, number[]>();
    for (const chunk of this.chunks.values()) {
      if (chunk.embedding && chunk.embeddingSpace === space && wanted.has(chunk.fingerprint)) {
        found.set(chunk.fingerprint, [...chunk.embedding]);
      }
    }
    return found;
  }

  async counts(): Promise<IndexCounts> {
    const documentsByStatus = emptyStatusCounts();
    for (const document of this.documents.values()) {
      documentsByStatus[document.status] += 1;
    }
    return { documents: this.documents.size, chunks: this.chunks.size, documentsByStatus };
  }

  private dropChunks(documentId: string): void {
    for (const [id, chunk] of this.chunks) {
      if (chunk.documentId === documentId) this.chunks.delete(id);
    }
  }
}
