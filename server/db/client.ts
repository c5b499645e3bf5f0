import pg from "pg";
import { newDb } from "pg-mem";
import type { Pool as PgPool } from "pg";
import { createLogger } from "../utils/log";
import { runMigrations } from "./migrator";

const { Pool } = pg;
const log = createLogger("db");

const memPools = new Map<string, PgPool>();
const migrations = new WeakMap<PgPool, Promise<void>>();

function createMemPool(key: string): PgPool {
  const cached = memPools.get(key);
  if (cached) {
    return cached;
  }
  const db = newDb({
    autoCreateForeignKeyIndices: true,
  });
  const adapter = db.adapters.createPg();
  const memPool = new adapter.Pool();
  memPools.set(key, memPool as unknown as PgPool);
  return memPool as unknown as PgPool;
}

/** `pg-mem://<name>` or an empty DSN gives a named in-process database. */
export function createPool(dsn?: string): PgPool {
  const trimmed = dsn?.trim();
  if (!trimmed) {
    log.warn("DATABASE_URL not provided, using in-memory pg-mem instance");
    return createMemPool("default");
  }
  if (trimmed.startsWith("pg-mem://")) {
    return createMemPool(trimmed.slice("pg-mem://".length) || "default");
  }
  return new Pool({ connectionString: trimmed });
}

export async function ensureDatabase(pool: PgPool): Promise<void> {
  let pending = migrations.get(pool);
  if (!pending) {
    pending = runMigrations(pool).then(
      () => undefined,
      (err: unknown) => {
        migrations.delete(pool);
        throw err;
      },
    );
    migrations.set(pool, pending);
  }
  await pending;
}

/** Ends the pool; pg-mem databases are forgotten so the next `createPool` starts empty. */
export async function closePool(pool: PgPool): Promise<void> {
  migrations.delete(pool);
  for (const [key, memPool] of memPools) {
    if (memPool === pool) memPools.delete(key);
  }
  try {
    await pool.end();
  } catch (err) {
    log.warn(`pool shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
