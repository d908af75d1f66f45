/**
 * PostgreSQL Mapping Store
 *
 * Raw SQL against url_map. The primary key on `code` is what makes
 * registration race-safe: two registrants of the same code both reach
 * INSERT ... ON CONFLICT DO NOTHING and exactly one sees a row inserted.
 */

import type { SqlClient } from "./client.js";
import type { InsertOutcome, Mapping, MappingRow, MappingStore, NewMapping } from "./types.js";

// =============================================================================
// SQL Queries
// =============================================================================

const SELECT_BY_CODE = `
  SELECT code, destination, created_at, expires_at, hit_count, last_accessed_at
  FROM url_map
  WHERE code = $1
  LIMIT 1
`;

const INSERT_IF_ABSENT = `
  INSERT INTO url_map (code, destination, created_at, expires_at, hit_count, last_accessed_at)
  VALUES ($1, $2, $3, $4, 0, NULL)
  ON CONFLICT (code) DO NOTHING
`;

const APPLY_DELTA = `
  UPDATE url_map
  SET hit_count = hit_count + $2,
      last_accessed_at = $3
  WHERE code = $1
`;

const HEALTH_QUERY = "SELECT 1";

/** SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = "23505";

// =============================================================================
// Store
// =============================================================================

export class PgMappingStore implements MappingStore {
  private readonly sql: SqlClient;

  constructor(sql: SqlClient) {
    this.sql = sql;
  }

  async getByCode(code: string): Promise<Mapping | null> {
    const result = await this.sql.query<MappingRow>(SELECT_BY_CODE, [code]);
    const row = result.rows[0];
    return row ? toMapping(row) : null;
  }

  async insertIfAbsent(mapping: NewMapping): Promise<InsertOutcome> {
    try {
      const result = await this.sql.query(INSERT_IF_ABSENT, [
        mapping.code,
        mapping.destination,
        mapping.createdAt,
        mapping.expiresAt,
      ]);
      return result.rowCount === 1 ? "inserted" : "conflict";
    } catch (err) {
      // ON CONFLICT covers the primary key; this catches any other
      // unique index a deployment adds
      if (isUniqueViolation(err)) return "conflict";
      throw err;
    }
  }

  async applyDelta(code: string, delta: number, now: Date): Promise<number> {
    const result = await this.sql.query(APPLY_DELTA, [code, delta, now]);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<boolean> {
    try {
      await this.sql.query(HEALTH_QUERY);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}

// =============================================================================
// Utilities
// =============================================================================

function toMapping(row: MappingRow): Mapping {
  return {
    code: row.code,
    destination: row.destination,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    hitCount: Number(row.hit_count),
    lastAccessedAt: row.last_accessed_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === UNIQUE_VIOLATION
  );
}
