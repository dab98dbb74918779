/**
 * PostgreSQL client
 *
 * One pg Pool per process, cached on globalThis so Next.js dev reloads
 * do not leak connections.
 */

import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { config } from "@/lib/config";
import { logSystem } from "@/lib/logger";
import { schema } from "./schema";

export type Database = NodePgDatabase<typeof schema>;

const globalForDb = globalThis as unknown as {
  supportPool: Pool | undefined;
};

export function getPool(): Pool {
  if (!globalForDb.supportPool) {
    const pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolSize,
    });
    pool.on("error", (error) => {
      logSystem("db.pool.error", { level: "error", message: error.message });
    });
    globalForDb.supportPool = pool;
  }
  return globalForDb.supportPool;
}

export function createDatabase(pool: Pool = getPool()): Database {
  return drizzle(pool, { schema });
}

export async function closePool(): Promise<void> {
  const pool = globalForDb.supportPool;
  globalForDb.supportPool = undefined;
  if (pool) await pool.end();
}
