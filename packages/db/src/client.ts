/**
 * PostgreSQL Pool Factory
 *
 * Uses `pg` directly - no ORM, no query builder. The core issues three
 * statements (lookup, conditional insert, delta update) and nothing else.
 */

import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { createLogger, type Logger } from "@linkpulse/logger";

/**
 * Minimal query interface (what we actually use).
 * Backed by pg.Pool in production; fakes in tests need no database.
 */
export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  end(): Promise<void>;
}

export interface PoolOptions {
  /** PostgreSQL connection URL */
  connectionString: string;
  /** Maximum connections (default: 10) */
  max?: number;
  /** Per-query timeout in ms (default: 2000) */
  queryTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Create a connection pool. Does not connect until the first query.
 */
export function createPool(options: PoolOptions): SqlClient {
  const {
    connectionString,
    max = 10,
    queryTimeoutMs = 2000,
    logger = createLogger("db"),
  } = options;

  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: queryTimeoutMs, // server side
    query_timeout: queryTimeoutMs, // client side
  });

  // Idle client errors would otherwise crash the process
  pool.on("error", (err: Error) => {
    logger.error({ err }, "Idle PostgreSQL client error");
  });

  return {
    query: (text: string, values?: unknown[]) => pool.query(text, values),
    end: () => pool.end(),
  };
}
