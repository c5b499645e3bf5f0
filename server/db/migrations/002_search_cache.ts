import type { Migration } from "./migration";

export const migration002: Migration = {
  id: "002_search_cache",
  description: "Search result cache keyed by query fingerprint",
  run: async (client) => {
    await client.query(`
      CREATE TABLE IF NOT EXISTS search_cache (
        cache_key text PRIMARY KEY,
        query_text text NOT NULL,
        mode text NOT NULL,
        results jsonb NOT NULL,
        result_count integer NOT NULL,
        created_at timestamptz NOT NULL DEFAULT now(),
        last_accessed_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS search_cache_last_accessed_idx
      ON search_cache(last_accessed_at);
    `);
  },
};
