import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import type { DatabaseConfig } from "../config.js";
import { createLogger } from "../logger.js";

/**
 * The one pg pool shared by the Postgres meeting store and migrations.
 * Nothing here runs when meetings are kept in files.
 */

const logger = createLogger("db");

let pool: Pool | null = null;

export function initializeDatabase(config: DatabaseConfig): void {
  if (pool) {
    return;
  }

  pool = new Pool({
    connectionString: config.connectionString,
    ssl: config.ssl,
    max: config.maxPoolSize,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });
  pool.on("error", (err) => {
    logger.error({ err }, "Idle Postgres connection failed");
  });
}

function activePool(): Pool {
  if (!pool) {
    throw new Error("Postgres pool used before initializeDatabase()");
  }
  return pool;
}

export function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  values?: unknown[]
): Promise<QueryResult<T>> {
  return activePool().query<T>(text, values);
}

/**
 * Run `work` on a single connection between BEGIN and COMMIT.
 * A throw rolls the transaction back and is rethrown.
 */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await activePool().connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK").catch((rollbackError: unknown) => {
      logger.error({ err: rollbackError }, "Rollback failed");
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function closeDatabase(): Promise<void> {
  const closing = pool;
  pool = null;
  await closing?.end();
}
