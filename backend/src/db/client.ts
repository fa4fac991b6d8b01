import pg from "pg";
import type { PoolClient, QueryResult, QueryResultRow } from "pg";
import { env } from "../config/env";
import { componentLogger } from "../config/logger";
import { StoreFailureError, errorMessage } from "../errors";

const log = componentLogger("db");

export const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
  max: 10,
  connectionTimeoutMillis: 5_000,
  idleTimeoutMillis: 30_000
});

// Idle client errors (server restart, network drop) must not crash the process.
pool.on("error", (err) => log.error({ err: err.message }, "idle postgres client error"));

function wrap(error: unknown, what: string): StoreFailureError {
  if (error instanceof StoreFailureError) return error;
  log.error({ err: errorMessage(error) }, `${what} failed`);
  return new StoreFailureError("Durable store unavailable", { cause: error });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  try {
    return await pool.query<T>(text, params);
  } catch (error) {
    throw wrap(error, "query");
  }
}

export async function withTx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    throw wrap(error, "connect");
  }
  try {
    await client.query("BEGIN");
    const res = await fn(client);
    await client.query("COMMIT");
    return res;
  } catch (error) {
    await client.query("ROLLBACK").catch((rollbackError: unknown) =>
      log.warn({ err: errorMessage(rollbackError) }, "rollback failed")
    );
    throw wrap(error, "transaction");
  } finally {
    client.release();
  }
}

export async function ping(): Promise<boolean> {
  try {
    await query("SELECT 1");
    return true;
  } catch {
    return false;
  }
}

export async function closePool(): Promise<void> {
  await pool.end();
}
