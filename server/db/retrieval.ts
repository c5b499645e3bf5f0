import type { Pool, PoolClient } from "pg";
import { z } from "zod";
import {
  DocumentFormat,
  DocumentMetadata,
  DocumentStatus,
  EmbeddingSource,
  type ChunkRecord,
  type TDocumentRecord,
} from "@shared/retrieval";
import { RetrievalError, StoreError } from "../services/retrieval/errors";
import {
  byScoreThenId,
  byTotalThenTerm,
  emptyStatusCounts,
  type DocumentPatch,
  type IndexCounts,
  type IndexStore,
  type NeighborOptions,
  type ScoredChunkId,
} from "../services/retrieval/index-store";
import { termCounts } from "../services/retrieval/keywords";
import { cosineSimilarity } from "../services/embeddings/vector";
import { isAbortError, throwIfAborted } from "../utils/abort";
import { ensureDatabase } from "./client";

type DocumentRow = {
  id: string;
  title: string;
  body: string;
  format: string;
  metadata: unknown;
  status: string;
  chunk_count: number;
  error: string | null;
  created_at: unknown;
  updated_at: unknown;
};

type ChunkRow = {
  id: string;
  document_id: string;
  sequence_index: number;
  content: string;
  fingerprint: string;
  embedding: unknown;
  embedding_space: string | null;
  embedding_source: string | null;
  keywords: unknown;
  word_count: number;
  char_count: number;
  start_offset: number;
  end_offset: number;
  overlap_chars: number;
  created_at: unknown;
};

const Vector = z.array(z.number()).nullable();
const Keywords = z.array(z.string());

const CHUNK_COLUMNS = `
  id, document_id, sequence_index, content, fingerprint, embedding, embedding_space,
  embedding_source, keywords, word_count, char_count, start_offset, end_offset,
  overlap_chars, created_at
`;

const DOCUMENT_COLUMNS = `
  id, title, body, format, metadata, status, chunk_count, error, created_at, updated_at
`;

// pg hands jsonb back parsed; some drivers and pg-mem paths return the raw text.
const fromJson = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
};

const toIso = (value: unknown): string => {
  if (value instanceof Date) return value.toISOString();
  const parsed = new Date(String(value));
  return Number.isNaN(parsed.getTime()) ? String(value) : parsed.toISOString();
};

const placeholders = (count: number, offset = 0): string =>
  Array.from({ length: count }, (_, idx) => `$${idx + 1 + offset}`).join(", ");

const mapDocument = (row: DocumentRow): TDocumentRecord => ({
  id: row.id,
  title: row.title,
  text: row.body,
  format: DocumentFormat.parse(row.format),
  metadata: DocumentMetadata.parse(fromJson(row.metadata) ?? {}),
  status: DocumentStatus.parse(row.status),
  chunkCount: Number(row.chunk_count),
  error: row.error,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
});

const mapChunk = (row: ChunkRow): ChunkRecord => ({
  id: row.id,
  documentId: row.document_id,
  sequenceIndex: Number(row.sequence_index),
  text: row.content,
  fingerprint: row.fingerprint,
  embedding: Vector.parse(fromJson(row.embedding) ?? null),
  embeddingSpace: row.embedding_space,
  embeddingSource: row.embedding_source === null ? null : EmbeddingSource.parse(row.embedding_source),
  keywords: Keywords.parse(fromJson(row.keywords) ?? []),
  wordCount: Number(row.word_count),
  charCount: Number(row.char_count),
  startOffset: Number(row.start_offset),
  endOffset: Number(row.end_offset),
  overlapChars: Number(row.overlap_chars),
  createdAt: toIso(row.created_at),
});

async function insertChunk(client: PoolClient, chunk: ChunkRecord): Promise<void> {
  await client.query(
    `
      INSERT INTO document_chunk (
        id, document_id, sequence_index, content, fingerprint, embedding, embedding_space,
        embedding_source, keywords, word_count, char_count, start_offset, end_offset,
        overlap_chars, created_at
      ) VALUES (
        $1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9::jsonb, $10, $11, $12, $13, $14, $15::timestamptz
      )
      ON CONFLICT (id)
      DO UPDATE SET
        content = excluded.content,
        fingerprint = excluded.fingerprint,
        embedding = excluded.embedding,
        embedding_space = excluded.embedding_space,
        embedding_source = excluded.embedding_source,
        keywords = excluded.keywords,
        word_count = excluded.word_count,
        char_count = excluded.char_count,
        start_offset = excluded.start_offset,
        end_offset = excluded.end_offset,
        overlap_chars = excluded.overlap_chars;
    `,
    [
      chunk.id,
      chunk.documentId,
      chunk.sequenceIndex,
      chunk.text,
      chunk.fingerprint,
      chunk.embedding ? JSON.stringify(chunk.embedding) : null,
      chunk.embeddingSpace,
      chunk.embeddingSource,
      JSON.stringify(chunk.keywords),
      chunk.wordCount,
      chunk.charCount,
      chunk.startOffset,
      chunk.endOffset,
      chunk.overlapChars,
      chunk.createdAt,
    ],
  );

  await client.query(`DELETE FROM chunk_term WHERE chunk_id = $1`, [chunk.id]);
  const terms = [...termCounts(chunk.text).entries()];
  if (terms.length === 0) return;
  const values: Array<string | number> = [];
  const rows = terms.map(([term, freq], idx) => {
    values.push(chunk.id, chunk.documentId, term, freq);
    return `(${placeholders(4, idx * 4)})`;
  });
  await client.query(`INSERT INTO chunk_term (chunk_id, document_id, term, freq) VALUES ${rows.join(", ")}`, values);
}

/** Postgres-backed index; similarity is computed here over the stored jsonb vectors. */
export class PgIndexStore implements IndexStore {
  readonly kind = "pg" as const;

  constructor(private readonly pool: Pool) {}

  async putDocument(document: TDocumentRecord): Promise<void> {
    await this.run("putDocument", async () => {
      await this.pool.query(
        `
          INSERT INTO document (id, title, body, format, metadata, status, chunk_count, error, created_at, updated_at)
          VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8, $9::timestamptz, $10::timestamptz)
          ON CONFLICT (id)
          DO UPDATE SET
            title = excluded.title,
            body = excluded.body,
            format = excluded.format,
            metadata = excluded.metadata,
            status = excluded.status,
            chunk_count = excluded.chunk_count,
            error = excluded.error,
            updated_at = excluded.updated_at;
        `,
        [
          document.id,
          document.title,
          document.text,
          document.format,
          JSON.stringify(document.metadata),
          document.status,
          document.chunkCount,
          document.error,
          document.createdAt,
          document.updatedAt,
        ],
      );
    });
  }

  async getDocument(id: string): Promise<TDocumentRecord | null> {
    return this.run("getDocument", async () => {
      const { rows } = await this.pool.query<DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM document WHERE id = $1`, [id]);
      return rows[0] ? mapDocument(rows[0]) : null;
    });
  }

  async updateDocument(id: string, patch: DocumentPatch): Promise<TDocumentRecord | null> {
    return this.run("updateDocument", async () => {
      const sets: string[] = [];
      const values: unknown[] = [];
      const assign = (column: string, value: unknown, cast = "") => {
        values.push(value);
        sets.push(`${column} = $${values.length}${cast}`);
      };
      if (patch.status !== undefined) assign("status", patch.status);
      if (patch.chunkCount !== undefined) assign("chunk_count", patch.chunkCount);
      if (patch.error !== undefined) assign("error", patch.error);
      if (patch.metadata !== undefined) assign("metadata", JSON.stringify(patch.metadata), "::jsonb");
      assign("updated_at", new Date().toISOString(), "::timestamptz");
      values.push(id);
      const { rows } = await this.pool.query<DocumentRow>(
        `UPDATE document SET ${sets.join(", ")} WHERE id = $${values.length} RETURNING ${DOCUMENT_COLUMNS}`,
        values,
      );
      return rows[0] ? mapDocument(rows[0]) : null;
    });
  }

  async deleteDocument(id: string): Promise<boolean> {
    return this.run("deleteDocument", () =>
      this.transaction(async (client) => {
        await client.query(`DELETE FROM chunk_term WHERE document_id = $1`, [id]);
        await client.query(`DELETE FROM document_chunk WHERE document_id = $1`, [id]);
        const { rows } = await client.query<{ id: string }>(`DELETE FROM document WHERE id = $1 RETURNING id`, [id]);
        return rows.length > 0;
      }),
    );
  }

  async upsertChunk(chunk: ChunkRecord): Promise<void> {
    await this.run("upsertChunk", () => this.transaction((client) => insertChunk(client, chunk)));
  }

  async replaceChunks(documentId: string, chunks: ChunkRecord[]): Promise<void> {
    await this.run("replaceChunks", () =>
      this.transaction(async (client) => {
        await client.query(`DELETE FROM chunk_term WHERE document_id = $1`, [documentId]);
        await client.query(`DELETE FROM document_chunk WHERE document_id = $1`, [documentId]);
        for (const chunk of chunks) {
          await insertChunk(client, chunk);
        }
      }),
    );
  }

  async getChunk(id: string): Promise<ChunkRecord | null> {
    return this.run("getChunk", async () => {
      const { rows } = await this.pool.query<ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM document_chunk WHERE id = $1`, [id]);
      return rows[0] ? mapChunk(rows[0]) : null;
    });
  }

  async getChunks(ids: string[]): Promise<ChunkRecord[]> {
    if (ids.length === 0) return [];
    return this.run("getChunks", async () => {
      const { rows } = await this.pool.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM document_chunk WHERE id IN (${placeholders(ids.length)})`,
        ids,
      );
      const byId = new Map(rows.map((row) => [row.id, mapChunk(row)]));
      return ids.flatMap((id) => {
        const chunk = byId.get(id);
        return chunk ? [chunk] : [];
      });
    });
  }

  async listDocumentChunks(documentId: string): Promise<ChunkRecord[]> {
    return this.run("listDocumentChunks", async () => {
      const { rows } = await this.pool.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM document_chunk WHERE document_id = $1 ORDER BY sequence_index ASC`,
        [documentId],
      );
      return rows.map(mapChunk);
    });
  }

  async nearestNeighbors(
    vector: number[],
    k: number,
    space: string,
    options: NeighborOptions = {},
  ): Promise<ScoredChunkId[]> {
    return this.run("nearestNeighbors", async () => {
      throwIfAborted(options.signal);
      const { rows } = await this.pool.query<{ id: string; document_id: string; embedding: unknown }>(
        `SELECT id, document_id, embedding FROM document_chunk WHERE embedding_space = $1 AND embedding IS NOT NULL`,
        [space],
      );
      throwIfAborted(options.signal);
      const scored: ScoredChunkId[] = [];
      for (const row of rows) {
        if (options.excludeDocumentId && row.document_id === options.excludeDocumentId) continue;
        const stored = Vector.parse(fromJson(row.embedding));
        if (!stored) continue;
        scored.push({ chunkId: row.id, score: cosineSimilarity(vector, stored) });
      }
      return scored.sort(byScoreThenId).slice(0, Math.max(0, k));
    });
  }

  async keywordSearch(terms: string[], k: number, options: { signal?: AbortSignal } = {}): Promise<ScoredChunkId[]> {
    const unique = [...new Set(terms)];
    if (unique.length === 0) return [];
    return this.run("keywordSearch", async () => {
      throwIfAborted(options.signal);
      const { rows } = await this.pool.query<{ chunk_id: string; score: string | number }>(
        `SELECT chunk_id, SUM(freq) AS score FROM chunk_term WHERE term IN (${placeholders(unique.length)}) GROUP BY chunk_id`,
        unique,
      );
      return rows
        .map((row) => ({ chunkId: row.chunk_id, score: Number(row.score) }))
        .filter((hit) => hit.score > 0)
        .sort(byScoreThenId)
        .slice(0, Math.max(0, k));
    });
  }

  async suggestTerms(fragment: string, limit: number): Promise<string[]> {
    if (!fragment) return [];
    return this.run("suggestTerms", async () => {
      const pattern = `%${fragment}%`;
      const { rows } = await this.pool.query<{ term: string; total: string | number }>(
        `SELECT term, SUM(freq) AS total FROM chunk_term WHERE term LIKE $1 GROUP BY term`,
        [pattern],
      );
      return rows
        .map((row) => ({ term: row.term, total: Number(row.total) }))
        .sort(byTotalThenTerm)
        .slice(0, Math.max(0, limit))
        .map((entry) => entry.term);
    });
  }

  async findEmbeddings(fingerprints: string[], space: string): Promise<Map<string, number[]>> {
    const found = new Map<string, number[]>();
    const unique = [...new Set(fingerprints)];
    if (unique.length === 0) return found;
    return this.run("findEmbeddings", async () => {
      const { rows } = await this.pool.query<{ fingerprint: string; embedding: unknown }>(
        `SELECT fingerprint, embedding FROM document_chunk WHERE embedding_space = $1 AND fingerprint IN (${placeholders(unique.length, 1)})`,
        [space, ...unique],
      );
      for (const row of rows) {
        const vector = Vector.parse(fromJson(row.embedding));
        if (vector) found.set(row.fingerprint, vector);
      }
      return found;
    });
  }

  async counts(): Promise<IndexCounts> {
    return this.run("counts", async () => {
      const byStatus = await this.pool.query<{ status: string; n: string | number }>(
        `SELECT status, COUNT(*) AS n FROM document GROUP BY status`,
      );
      const chunks = await this.pool.query<{ n: string | number }>(`SELECT COUNT(*) AS n FROM document_chunk`);
      const documentsByStatus = emptyStatusCounts();
      let documents = 0;
      for (const row of byStatus.rows) {
        const status = DocumentStatus.safeParse(row.status);
        const n = Number(row.n);
        documents += n;
        if (status.success) documentsByStatus[status.data] += n;
      }
      return { documents, chunks: Number(chunks.rows[0]?.n ?? 0), documentsByStatus };
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await ensureDatabase(this.pool);
      return await fn();
    } catch (error) {
      if (error instanceof RetrievalError || isAbortError(error)) {
        throw error;
      }
      throw new StoreError(operation, error);
    }
  }

  private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
