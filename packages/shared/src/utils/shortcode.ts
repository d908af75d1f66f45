/**
 * Short Code Generation Module
 *
 * Strategy: Random Base62
 * - Length: 7 characters by default (62^7 = ~3.5 trillion combinations)
 * - Alphabet: 0-9A-Za-z (62 URL-safe characters)
 * - Collision handling: the caller inserts with a uniqueness constraint and
 *   retries with a fresh candidate on conflict
 *
 * Why Cryptographic Randomness?
 * - Unpredictable: Cannot enumerate or guess valid short codes
 * - No information leakage about link creation order
 * - No coordination needed between servers
 */

import { randomBytes } from "node:crypto";
import { SHORTCODE_CONFIG, URL_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

// =============================================================================
// GENERATION
// =============================================================================

const ALPHABET = SHORTCODE_CONFIG.ALPHABET;

/**
 * Largest multiple of the alphabet size that fits in a byte (62 * 4 = 248).
 * Bytes at or above it are discarded so each symbol keeps probability 1/62.
 */
const UNBIASED_LIMIT = 256 - (256 % ALPHABET.length);

/**
 * Generate a random Base62 short code.
 *
 * @param length - Code length (default: from SHORTCODE_CONFIG)
 * @returns Random Base62 string
 *
 * @example
 * ```ts
 * const code = generateRandomCode();    // "aB3xY9k"
 * const longer = generateRandomCode(10); // "aB3xY9kM2p"
 * ```
 */
export function generateRandomCode(length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH): string {
  let code = "";

  while (code.length < length) {
    // Over-draw a little so one round usually suffices despite rejections
    const bytes = randomBytes(Math.ceil((length - code.length) * 1.1) + 1);
    for (const byte of bytes) {
      if (byte >= UNBIASED_LIMIT) continue;
      code += ALPHABET[byte % ALPHABET.length];
      if (code.length === length) break;
    }
  }

  return code;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate a user-supplied alias: 3-32 characters of [A-Za-z0-9_-].
 */
export function validateCustomAlias(alias: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG.CUSTOM_ALIAS;

  if (alias.length < MIN_LENGTH) {
    return { valid: false, error: `Alias must be at least ${MIN_LENGTH} characters` };
  }

  if (alias.length > MAX_LENGTH) {
    return { valid: false, error: `Alias must be at most ${MAX_LENGTH} characters` };
  }

  if (!PATTERN.test(alias)) {
    return {
      valid: false,
      error: "Alias can only contain letters, numbers, underscores, and hyphens",
    };
  }

  return { valid: true };
}

/**
 * Cheap format check before any store lookup.
 */
export function isLookupableCode(code: string): boolean {
  return SHORTCODE_CONFIG.LOOKUP_PATTERN.test(code);
}

/**
 * Validate a destination URL (http/https, bounded length).
 */
export function isValidUrl(url: string): boolean {
  if (url.length === 0 || url.length > URL_CONFIG.MAX_LENGTH) return false;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  return URL_CONFIG.ALLOWED_PROTOCOLS.some((protocol) => protocol === parsed.protocol);
}
