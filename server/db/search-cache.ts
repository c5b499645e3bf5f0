import type { Pool } from "pg";
import { ScoredResultList, SearchMode } from "@shared/retrieval";
import { CacheError } from "../services/retrieval/errors";
import type { CacheEntry, CachePayload, SearchCache } from "../services/retrieval/search-cache";
import { ensureDatabase } from "./client";

type CacheRow = {
  cache_key: string;
  query_text: string;
  mode: string;
  results: unknown;
  result_count: number;
  created_at: unknown;
  last_accessed_at: unknown;
};

const toIso = (value: unknown): string => (value instanceof Date ? value.toISOString() : new Date(String(value)).toISOString());

const parseResults = (value: unknown) => ScoredResultList.parse(typeof value === "string" ? JSON.parse(value) : value);

export class PgSearchCache implements SearchCache {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<CacheEntry | null> {
    return this.run("get", async () => {
      const { rows } = await this.pool.query<CacheRow>(
        `
          UPDATE search_cache SET last_accessed_at = $2::timestamptz
          WHERE cache_key = $1
          RETURNING cache_key, query_text, mode, results, result_count, created_at, last_accessed_at
        `,
        [key, new Date(this.now()).toISOString()],
      );
      const row = rows[0];
      if (!row) return null;
      return {
        key: row.cache_key,
        queryText: row.query_text,
        mode: SearchMode.parse(row.mode),
        results: parseResults(row.results),
        resultCount: Number(row.result_count),
        createdAt: toIso(row.created_at),
        lastAccessedAt: toIso(row.last_accessed_at),
      };
    });
  }

  async put(key: string, payload: CachePayload): Promise<void> {
    const stamp = new Date(this.now()).toISOString();
    await this.run("put", async () => {
      await this.pool.query(
        `
          INSERT INTO search_cache (cache_key, query_text, mode, results, result_count, created_at, last_accessed_at)
          VALUES ($1, $2, $3, $4::jsonb, $5, $6::timestamptz, $7::timestamptz)
          ON CONFLICT (cache_key)
          DO UPDATE SET
            query_text = excluded.query_text,
            mode = excluded.mode,
            results = excluded.results,
            result_count = excluded.result_count,
            created_at = excluded.created_at,
            last_accessed_at = excluded.last_accessed_at;
        `,
        [key, payload.queryText, payload.mode, JSON.stringify(payload.results), payload.results.length, stamp, stamp],
      );
    });
  }

  async evictExpired(retentionMs: number): Promise<number> {
    const cutoff = new Date(this.now() - retentionMs).toISOString();
    return this.run("evictExpired", async () => {
      const { rows } = await this.pool.query<{ cache_key: string }>(
        `DELETE FROM search_cache WHERE last_accessed_at < $1::timestamptz RETURNING cache_key`,
        [cutoff],
      );
      return rows.length;
    });
  }

  async size(): Promise<number> {
    return this.run("size", async () => {
      const { rows } = await this.pool.query<{ n: string | number }>(`SELECT COUNT(*) AS n FROM search_cache`);
      return Number(rows[0]?.n ?? 0);
    });
  }

  async clear(): Promise<void> {
    await this.run("clear", async () => {
      await this.pool.query(`DELETE FROM search_cache`);
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await ensureDatabase(this.pool);
      return await fn();
    } catch (error) {
      if (error instanceof CacheError) throw error;
      throw new CacheError(operation, error);
    }
  }
}
