import { z } from "zod";

export const SEARCH_MODES = ["semantic", "keyword", "hybrid"] as const;
export const DOCUMENT_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export const DOCUMENT_FORMATS = ["text", "markdown"] as const;

export const SearchMode = z.enum(SEARCH_MODES);
export type TSearchMode = z.infer<typeof SearchMode>;

export const DocumentStatus = z.enum(DOCUMENT_STATUSES);
export type TDocumentStatus = z.infer<typeof DocumentStatus>;

export const DocumentFormat = z.enum(DOCUMENT_FORMATS);
export type TDocumentFormat = z.infer<typeof DocumentFormat>;

export const EmbeddingSource = z.enum(["primary", "fallback"]);
export type TEmbeddingSource = z.infer<typeof EmbeddingSource>;

export const DocumentMetadata = z.record(z.unknown());

export const IngestRequest = z.object({
  title: z.string().trim().min(1).max(255),
  text: z.string(),
  format: DocumentFormat.default("text"),
  metadata: DocumentMetadata.default({}),
});

export type TIngestRequest = z.input<typeof IngestRequest>;

export const DocumentRecord = z.object({
  id: z.string(),
  title: z.string(),
  text: z.string(),
  format: DocumentFormat,
  metadata: DocumentMetadata,
  status: DocumentStatus,
  chunkCount: z.number().int().nonnegative(),
  error: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type TDocumentRecord = z.infer<typeof DocumentRecord>;

export type ChunkRecord = {
  id: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  fingerprint: string;
  embedding: number[] | null;
  embeddingSpace: string | null;
  embeddingSource: TEmbeddingSource | null;
  keywords: string[];
  wordCount: number;
  charCount: number;
  startOffset: number;
  endOffset: number;
  overlapChars: number;
  createdAt: string;
};

export const ScoredResult = z.object({
  chunkId: z.string(),
  documentId: z.string(),
  sequenceIndex: z.number().int().nonnegative(),
  content: z.string(),
  semanticScore: z.number(),
  keywordScore: z.number(),
  fusedScore: z.number(),
  matchedKeywords: z.array(z.string()),
  context: z.string(),
});

export type TScoredResult = z.infer<typeof ScoredResult>;

export const ScoredResultList = z.array(ScoredResult);

export const SEARCH_STATES = [
  "received",
  "embedding",
  "retrieving",
  "fusing",
  "cached",
  "returned",
  "failed",
] as const;

export type SearchState = (typeof SEARCH_STATES)[number];

export type SearchLeg = "semantic" | "keyword";

export type DegradedLeg = {
  leg: SearchLeg;
  reason: "timeout" | "embedding_unavailable";
};

export type SearchResponse = {
  query: string;
  mode: TSearchMode;
  limit: number;
  results: TScoredResult[];
  cached: boolean;
  degraded: DegradedLeg[];
  embeddingSource: TEmbeddingSource | null;
  states: SearchState[];
};

export type RetrievalStats = {
  documents: number;
  chunks: number;
  cacheEntries: number;
  documentsByStatus: Record<TDocumentStatus, number>;
  embeddings: {
    primary: string;
    fallback: string | null;
    cachedVectors: number;
    breakerOpen: boolean;
  };
};
