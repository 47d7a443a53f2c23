import { Pool, type PoolClient, type QueryResultRow } from "pg";
import { loadConfig } from "../config/env";
import { log, LogLevel } from "../utils/logger";

let pool: Pool | null = null;

/**
 * The shared connection pool, created from the environment on first use so
 * that importing this module never requires a configured database.
 */
export function getPool(): Pool {
  if (pool) return pool;

  const config = loadConfig();
  pool = new Pool({
    connectionString: config.databaseUrl,
    max: Math.max(config.concurrency + 2, 4),
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: 15_000,
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined
  });

  pool.on("error", (err) => {
    log(LogLevel.ERROR, "Postgres", `Unexpected error on idle client: ${err.message}`);
  });

  return pool;
}

/**
 * Executes a parameterized query on a pooled client.
 * @param text - SQL with positional placeholders ($1, $2, ...)
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<{ rows: T[]; rowCount: number | null }> {
  return getPool().query<T>(text, params);
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back when it
 * throws. The client is always released.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err: unknown) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
      log(
        LogLevel.WARN,
        "Postgres",
        `Rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`
      );
    });
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Drains the pool. Call once during shutdown; a later query creates a new pool.
 */
export async function shutdownPool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
