import type { Pool } from "pg";
import { createLogger } from "../utils/log";
import { migration001 } from "./migrations/001_documents";
import { migration002 } from "./migrations/002_search_cache";
import type { Migration } from "./migrations/migration";

const log = createLogger("db");

export const MIGRATIONS: Migration[] = [migration001, migration002];

export async function runMigrations(pool: Pool, migrations: Migration[] = MIGRATIONS): Promise<string[]> {
  const client = await pool.connect();
  const appliedNow: string[] = [];
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    const applied = new Set<string>();
    const { rows } = await client.query<{ id: string }>(`SELECT id FROM schema_migrations;`);
    for (const row of rows) {
      applied.add(row.id);
    }

    for (const migration of migrations) {
      if (applied.has(migration.id)) {
        continue;
      }

      await client.query("BEGIN");
      try {
        await migration.run(client);
        await client.query(`INSERT INTO schema_migrations(id) VALUES ($1)`, [migration.id]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      log.info(`applied ${migration.id}: ${migration.description}`);
      appliedNow.push(migration.id);
    }
  } finally {
    client.release();
  }
  return appliedNow;
}
