/**
 * Durable Store Type Definitions
 *
 * Table: url_map
 *
 *   code              VARCHAR(32)   PRIMARY KEY
 *   destination       VARCHAR(2048) NOT NULL
 *   created_at        TIMESTAMPTZ   NOT NULL
 *   expires_at        TIMESTAMPTZ   NULL      -- NULL = never expires
 *   hit_count         BIGINT        NOT NULL DEFAULT 0
 *   last_accessed_at  TIMESTAMPTZ   NULL      -- written by the flush only
 */

// =============================================================================
// Domain Types
// =============================================================================

/**
 * Authoritative short code → destination record.
 */
export interface Mapping {
  code: string;
  destination: string;
  createdAt: Date;
  /** null = never expires. Checked at read time, never deleted. */
  expiresAt: Date | null;
  /** Flushed clicks only; pending hits live in the fast store */
  hitCount: number;
  lastAccessedAt: Date | null;
}

/**
 * Fields supplied at registration. Counters start at zero.
 */
export type NewMapping = Pick<Mapping, "code" | "destination" | "createdAt" | "expiresAt">;

/**
 * Result of a conditional insert. `conflict` means the code already exists
 * (the primary key is the final arbiter between concurrent registrants).
 */
export type InsertOutcome = "inserted" | "conflict";

// =============================================================================
// Store Contract
// =============================================================================

export interface MappingStore {
  getByCode(code: string): Promise<Mapping | null>;

  /** Insert iff no row with this code exists. */
  insertIfAbsent(mapping: NewMapping): Promise<InsertOutcome>;

  /**
   * hit_count += delta, last_accessed_at = now, in one statement.
   * Returns affected rows (0 when the code does not exist).
   */
  applyDelta(code: string, delta: number, now: Date): Promise<number>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// =============================================================================
// Row Types
// =============================================================================

/**
 * Database row shape for url_map
 */
export interface MappingRow {
  code: string;
  destination: string;
  created_at: Date;
  expires_at: Date | null;
  /** pg returns BIGINT as a string */
  hit_count: string | number;
  last_accessed_at: Date | null;
}
