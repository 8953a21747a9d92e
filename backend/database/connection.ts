import { Pool, type PoolClient, type PoolConfig, type QueryResult } from "pg";

// CycleCast Database Connection Manager
// Single pool instance shared across the application.

let pool: Pool | undefined;
let connectionString: string | undefined;

// Must run before the first query when Postgres storage is selected.
export function configureDatabase(databaseUrl: string): void {
  connectionString = databaseUrl;
}

export function getDatabasePool(): Pool {
  if (!pool) {
    if (!connectionString) throw new Error("Database is not configured (DATABASE_URL missing).");

    const config: PoolConfig = {
      connectionString,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    };

    pool = new Pool(config);

    pool.on("error", (err: Error) => {
      console.error("[CycleCast DB] Unexpected error on idle client:", err.message);
    });

    console.log("[CycleCast DB] Connection pool created");
  }
  return pool;
}

export async function query<T extends Record<string, unknown> = Record<string, unknown>>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const p = getDatabasePool();
  const start = Date.now();
  const result = await p.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > 1000) {
    console.warn(`[CycleCast DB] Slow query (${duration}ms):`, text.trim().substring(0, 100));
  }

  return result;
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const p = getDatabasePool();
  const client = await p.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    console.log("[CycleCast DB] Connection pool closed");
  }
}
