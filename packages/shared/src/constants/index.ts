/**
 * Short Code Configuration Constants
 *
 * Single source of truth for all short code generation parameters.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for auto-generated short codes.
   * 7 chars = 62^7 = ~3.5 trillion combinations.
   */
  DEFAULT_LENGTH: 7,

  /**
   * Base62 alphabet: 0-9A-Za-z
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",

  /**
   * Maximum insert attempts for generated codes before giving up
   * with CODE_SPACE_EXHAUSTED.
   */
  MAX_ATTEMPTS: 10,

  /**
   * Custom alias constraints (user-provided short codes).
   */
  CUSTOM_ALIAS: {
    MIN_LENGTH: 3,
    MAX_LENGTH: 32,
    /** Letters, digits, hyphens, underscores. */
    PATTERN: /^[A-Za-z0-9_-]+$/,
  },

  /**
   * Anything a stored code could look like (generated or alias).
   * Used to reject lookups before any I/O.
   */
  LOOKUP_PATTERN: /^[A-Za-z0-9_-]{1,32}$/,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Link lifecycle defaults.
 */
export const LINK_DEFAULTS = {
  /** Expiry applied when the caller gives none. 0 disables it. */
  EXPIRY_DAYS: 30,

  /** Cache TTL for links that never expire (seconds) */
  CACHE_TTL_SECONDS: 86400,

  /** Bound on a single fast-store round-trip on hot paths (ms) */
  FAST_STORE_TIMEOUT_MS: 50,
} as const;

/**
 * Rate limiting defaults.
 */
export const RATE_LIMIT_DEFAULTS = {
  LIMIT: 60,
  WINDOW_SECONDS: 60,
} as const;

/**
 * Flush worker defaults.
 */
export const FLUSH_DEFAULTS = {
  INTERVAL_MS: 10_000,
  SCAN_COUNT: 500,
} as const;
