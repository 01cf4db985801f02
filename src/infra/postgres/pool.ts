import { Pool } from "pg";
import type { Logger } from "../../common/logger";
import { config } from "../../config";

let pool: Pool | null = null;

export type PoolProbe = {
  latencyMs: number;
  totalCount: number;
  idleCount: number;
  waitingCount: number;
};

export function getPool(logger?: Logger): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      application_name: "account-movements-api",
      max: config.DB_POOL_SIZE,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      statement_timeout: config.DB_QUERY_TIMEOUT_MS,
      query_timeout: config.DB_QUERY_TIMEOUT_MS
    });
    // Emitted for idle clients, outside any query
    pool.on("error", (error) => {
      logger?.error({ err: error }, "Idle postgres client error");
    });
  }

  return pool;
}

/** Round-trips `SELECT 1` and reports the pool counters alongside. */
export async function probePool(logger?: Logger): Promise<PoolProbe> {
  const current = getPool(logger);
  const start = Date.now();
  await current.query("SELECT 1");
  return {
    latencyMs: Date.now() - start,
    totalCount: current.totalCount,
    idleCount: current.idleCount,
    waitingCount: current.waitingCount
  };
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}
