/**
 * In-process Mapping Store
 *
 * Map-backed {@link MappingStore} with the same contract as the PostgreSQL
 * store: insertIfAbsent is atomic (single-threaded), applyDelta touches
 * existing rows only. Records every write for assertions.
 */

import type { InsertOutcome, Mapping, MappingStore, NewMapping } from "./types.js";

export interface RecordedDelta {
  code: string;
  delta: number;
  now: Date;
}

export class MemoryMappingStore implements MappingStore {
  private readonly rows = new Map<string, Mapping>();

  /** Every applyDelta call, including those that matched no row */
  readonly deltas: RecordedDelta[] = [];

  async getByCode(code: string): Promise<Mapping | null> {
    const row = this.rows.get(code);
    return row ? { ...row } : null;
  }

  async insertIfAbsent(mapping: NewMapping): Promise<InsertOutcome> {
    if (this.rows.has(mapping.code)) return "conflict";

    this.rows.set(mapping.code, {
      ...mapping,
      hitCount: 0,
      lastAccessedAt: null,
    });
    return "inserted";
  }

  async applyDelta(code: string, delta: number, now: Date): Promise<number> {
    this.deltas.push({ code, delta, now });

    const row = this.rows.get(code);
    if (!row) return 0;

    row.hitCount += delta;
    row.lastAccessedAt = now;
    return 1;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  /** Seed a row directly (bypasses insertIfAbsent). */
  put(mapping: Mapping): void {
    this.rows.set(mapping.code, { ...mapping });
  }

  get size(): number {
    return this.rows.size;
  }
}
