/**
 * Link Service
 *
 * Cache-aside registration and resolution. PostgreSQL is the source of
 * truth; Redis only ever holds copies, so any cache failure degrades
 * latency and never correctness.
 *
 * Write path: validate → durable insert (primary key decides races) → warm cache
 * Read path:  cache (bounded) → durable lookup on miss → warm cache
 */

import type { FastStore } from "@linkpulse/cache";
import type { Mapping, MappingStore } from "@linkpulse/db";
import { createLogger, type Logger } from "@linkpulse/logger";
import {
  ErrorCode,
  LINK_DEFAULTS,
  SHORTCODE_CONFIG,
  entryKey,
  failure,
  generateRandomCode,
  isLookupableCode,
  isValidUrl,
  systemClock,
  validateCustomAlias,
  withTimeout,
  type Clock,
  type Failure,
} from "@linkpulse/shared";
import { cacheTtlSeconds, computeExpiresAt, isExpired } from "./expiry.js";

// =============================================================================
// Types
// =============================================================================

export interface LinkServiceConfig {
  /** Length of generated codes */
  codeLength: number;
  /** Applied when a registration names no expiry. <= 0 disables expiry. */
  defaultExpiryDays: number;
  /** Cache TTL for mappings that never expire */
  cacheTtlSeconds: number;
  /** Bound on each fast-store round-trip */
  fastStoreTimeoutMs: number;
  /** Generated-code insert attempts before CODE_SPACE_EXHAUSTED */
  maxAttempts: number;
}

/**
 * Source of not-yet-flushed hit counts. Implemented by the click accumulator.
 */
export interface PendingHitsReader {
  pendingCount(code: string): Promise<number>;
}

export interface LinkServiceDeps {
  fast: FastStore;
  store: MappingStore;
  config?: Partial<LinkServiceConfig>;
  pending?: PendingHitsReader;
  clock?: Clock;
  logger?: Logger;
  /** Candidate code source (default: crypto-random Base62) */
  generateCode?: (length: number) => string;
}

export interface RegisterInput {
  destination: string;
  /** User-chosen alias; generated when omitted */
  customCode?: string;
  /** Days until expiry; defaults to config, <= 0 means never */
  expiresInDays?: number;
}

export interface RegisteredLink {
  code: string;
  destination: string;
  createdAt: Date;
  expiresAt: Date | null;
}

export interface LinkStats extends RegisteredLink {
  /** Flushed count plus pending hits */
  hitCount: number;
  lastAccessedAt: Date | null;
}

export type RegisterError =
  | typeof ErrorCode.INVALID_URL
  | typeof ErrorCode.INVALID_ALIAS
  | typeof ErrorCode.ALIAS_TAKEN
  | typeof ErrorCode.CODE_SPACE_EXHAUSTED
  | typeof ErrorCode.STORE_UNAVAILABLE;

export type LookupError = typeof ErrorCode.NOT_FOUND | typeof ErrorCode.STORE_UNAVAILABLE;

export type RegisterResult = { success: true; link: RegisteredLink } | Failure<RegisterError>;

export type ResolveResult =
  | { success: true; destination: string; source: "cache" | "store" }
  | Failure<LookupError>;

export type StatsResult = { success: true; stats: LinkStats } | Failure<LookupError>;

type LiveLookup = { success: true; mapping: Mapping } | Failure<LookupError>;

export const DEFAULT_LINK_SERVICE_CONFIG: LinkServiceConfig = {
  codeLength: SHORTCODE_CONFIG.DEFAULT_LENGTH,
  defaultExpiryDays: LINK_DEFAULTS.EXPIRY_DAYS,
  cacheTtlSeconds: LINK_DEFAULTS.CACHE_TTL_SECONDS,
  fastStoreTimeoutMs: LINK_DEFAULTS.FAST_STORE_TIMEOUT_MS,
  maxAttempts: SHORTCODE_CONFIG.MAX_ATTEMPTS,
};

const NOT_FOUND_MESSAGE = "Short link not found";
const STORE_UNAVAILABLE_MESSAGE = "Link store is temporarily unavailable";

// =============================================================================
// Link Service
// =============================================================================

export class LinkService {
  private readonly fast: FastStore;
  private readonly store: MappingStore;
  private readonly config: LinkServiceConfig;
  private readonly pending: PendingHitsReader | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly generateCode: (length: number) => string;

  constructor(deps: LinkServiceDeps) {
    this.fast = deps.fast;
    this.store = deps.store;
    this.config = { ...DEFAULT_LINK_SERVICE_CONFIG, ...deps.config };
    this.pending = deps.pending ?? null;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger("links");
    this.generateCode = deps.generateCode ?? generateRandomCode;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Create a mapping under a custom alias or a generated code.
   */
  async register(input: RegisterInput): Promise<RegisterResult> {
    if (!isValidUrl(input.destination)) {
      return failure(ErrorCode.INVALID_URL, "URL must use http or https and be at most 2048 characters");
    }

    const now = this.clock();
    const expiresAt = computeExpiresAt(input.expiresInDays ?? this.config.defaultExpiryDays, now);

    const result =
      input.customCode !== undefined
        ? await this.registerAlias(input.customCode, input.destination, now, expiresAt)
        : await this.registerGenerated(input.destination, now, expiresAt);

    if (result.success) {
      await this.warmCache(result.link.code, result.link.destination, result.link.expiresAt, now);
      this.logger.info(
        { code: result.link.code, custom: input.customCode !== undefined, expiresAt },
        "Link registered"
      );
    }

    return result;
  }

  private async registerAlias(
    alias: string,
    destination: string,
    now: Date,
    expiresAt: Date | null
  ): Promise<RegisterResult> {
    const validation = validateCustomAlias(alias);
    if (!validation.valid) {
      return failure(ErrorCode.INVALID_ALIAS, validation.error ?? "Invalid alias");
    }

    const taken = failure(ErrorCode.ALIAS_TAKEN, `Alias "${alias}" is already taken`);

    try {
      // Expired mappings still own their code
      if (await this.store.getByCode(alias)) return taken;

      const outcome = await this.store.insertIfAbsent({ code: alias, destination, createdAt: now, expiresAt });
      if (outcome === "conflict") return taken;
    } catch (err) {
      this.logger.error({ err, code: alias }, "Failed to register alias");
      return failure(ErrorCode.STORE_UNAVAILABLE, STORE_UNAVAILABLE_MESSAGE);
    }

    return { success: true, link: { code: alias, destination, createdAt: now, expiresAt } };
  }

  private async registerGenerated(
    destination: string,
    now: Date,
    expiresAt: Date | null
  ): Promise<RegisterResult> {
    const { codeLength, maxAttempts } = this.config;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const code = this.generateCode(codeLength);

      try {
        const outcome = await this.store.insertIfAbsent({ code, destination, createdAt: now, expiresAt });
        if (outcome === "inserted") {
          return { success: true, link: { code, destination, createdAt: now, expiresAt } };
        }
      } catch (err) {
        this.logger.error({ err, code, attempt }, "Failed to register generated code");
        return failure(ErrorCode.STORE_UNAVAILABLE, STORE_UNAVAILABLE_MESSAGE);
      }

      this.logger.debug({ code, attempt }, "Generated code collided");
    }

    this.logger.error({ maxAttempts, codeLength }, "Code space exhausted");
    return failure(
      ErrorCode.CODE_SPACE_EXHAUSTED,
      `No free code found after ${maxAttempts} attempts. Please try again.`
    );
  }

  // ===========================================================================
  // Resolution
  // ===========================================================================

  /**
   * Map a code to its destination. Absent and expired codes are both NOT_FOUND.
   */
  async resolve(code: string): Promise<ResolveResult> {
    if (!isLookupableCode(code)) {
      return failure(ErrorCode.NOT_FOUND, NOT_FOUND_MESSAGE);
    }

    const cached = await this.readCache(code);
    if (cached !== null) {
      return { success: true, destination: cached, source: "cache" };
    }

    const now = this.clock();
    const lookup = await this.findLive(code, now);
    if (!lookup.success) return lookup;

    const { mapping } = lookup;
    await this.warmCache(code, mapping.destination, mapping.expiresAt, now);
    return { success: true, destination: mapping.destination, source: "store" };
  }

  /**
   * Mapping details with hit count = flushed + pending.
   */
  async getStats(code: string): Promise<StatsResult> {
    if (!isLookupableCode(code)) {
      return failure(ErrorCode.NOT_FOUND, NOT_FOUND_MESSAGE);
    }

    const lookup = await this.findLive(code, this.clock());
    if (!lookup.success) return lookup;

    const { mapping } = lookup;
    const pending = this.pending ? await this.pending.pendingCount(code) : 0;

    return {
      success: true,
      stats: {
        code: mapping.code,
        destination: mapping.destination,
        createdAt: mapping.createdAt,
        expiresAt: mapping.expiresAt,
        hitCount: mapping.hitCount + pending,
        lastAccessedAt: mapping.lastAccessedAt,
      },
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async findLive(code: string, now: Date): Promise<LiveLookup> {
    let mapping: Mapping | null;
    try {
      mapping = await this.store.getByCode(code);
    } catch (err) {
      this.logger.error({ err, code }, "Durable lookup failed");
      return failure(ErrorCode.STORE_UNAVAILABLE, STORE_UNAVAILABLE_MESSAGE);
    }

    if (!mapping || isExpired(mapping.expiresAt, now)) {
      return failure(ErrorCode.NOT_FOUND, NOT_FOUND_MESSAGE);
    }

    return { success: true, mapping };
  }

  /**
   * Cached destination, or null on miss, timeout or error.
   */
  private async readCache(code: string): Promise<string | null> {
    try {
      return await withTimeout(this.fast.get(entryKey(code)), this.config.fastStoreTimeoutMs);
    } catch (err) {
      this.logger.warn({ err, code }, "Cache read failed, falling back to store");
      return null;
    }
  }

  private async warmCache(code: string, destination: string, expiresAt: Date | null, now: Date): Promise<void> {
    const ttl = cacheTtlSeconds(expiresAt, this.config.cacheTtlSeconds, now);

    try {
      const written = await withTimeout(
        this.fast.setWithTtl(entryKey(code), destination, ttl).then(() => true),
        this.config.fastStoreTimeoutMs
      );
      if (written === null) {
        this.logger.warn({ code }, "Cache warm timed out");
      }
    } catch (err) {
      this.logger.warn({ err, code }, "Cache warm failed");
    }
  }
}
