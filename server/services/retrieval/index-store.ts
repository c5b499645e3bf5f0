import type { ChunkRecord, TDocumentRecord, TDocumentStatus } from "@shared/retrieval";

export type ScoredChunkId = {
  chunkId: string;
  score: number;
};

export type DocumentPatch = Partial<Pick<TDocumentRecord, "status" | "chunkCount" | "error" | "metadata">>;

export type IndexCounts = {
  documents: number;
  chunks: number;
  documentsByStatus: Record<TDocumentStatus, number>;
};

export type NeighborOptions = {
  excludeDocumentId?: string;
  signal?: AbortSignal;
};

/**
 * Durable home of documents and chunks. Implementations wrap their own failures in
 * StoreError and return neighbor and keyword hits ordered by score desc, then chunk id.
 */
export interface IndexStore {
  readonly kind: "pg" | "memory";

  putDocument(document: TDocumentRecord): Promise<void>;
  getDocument(id: string): Promise<TDocumentRecord | null>;
  /** Applies the patch and bumps `updatedAt`; null when the document does not exist. */
  updateDocument(id: string, patch: DocumentPatch): Promise<TDocumentRecord | null>;
  deleteDocument(id: string): Promise<boolean>;

  upsertChunk(chunk: ChunkRecord): Promise<void>;
  /** Drops every chunk of the document, then writes `chunks`, as one unit. */
  replaceChunks(documentId: string, chunks: ChunkRecord[]): Promise<void>;
  getChunk(id: string): Promise<ChunkRecord | null>;
  getChunks(ids: string[]): Promise<ChunkRecord[]>;
  listDocumentChunks(documentId: string): Promise<ChunkRecord[]>;

  /** Cosine-ranked chunks whose vectors live in `space`. */
  nearestNeighbors(vector: number[], k: number, space: string, options?: NeighborOptions): Promise<ScoredChunkId[]>;
  /** Chunks containing any of `terms`, scored by the summed term frequency. */
  keywordSearch(terms: string[], k: number, options?: { signal?: AbortSignal }): Promise<ScoredChunkId[]>;
  /** Indexed terms containing `fragment` (letters and digits only), most frequent first. */
  suggestTerms(fragment: string, limit: number): Promise<string[]>;
  /** Stored vectors in `space`, keyed by chunk fingerprint, for reuse on re-ingest. */
  findEmbeddings(fingerprints: string[], space: string): Promise<Map<string, number[]>>;

  counts(): Promise<IndexCounts>;
}

export const emptyStatusCounts = (): Record<TDocumentStatus, number> => ({
  pending: 0,
  processing: 0,
  completed: 0,
  failed: 0,
});

export type TermTotal = { term: string; total: number };

export const byTotalThenTerm = (a: TermTotal, b: TermTotal): number =>
  b.total - a.total || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0);

export const byScoreThenId = (a: ScoredChunkId, b: ScoredChunkId): number =>
  b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0);
