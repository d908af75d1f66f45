/**
 * @linkpulse/shared - Shared Package Exports
 *
 * Key scheme, short code generation, error codes and small utilities
 * used by every other package.
 *
 * ```ts
 * import { entryKey, generateRandomCode, ErrorCode } from "@linkpulse/shared";
 * ```
 */

// Types (ErrorCode, Failure, Clock)
export * from "./types/index.js";

// Fast-store key scheme
export * from "./keys.js";

// Utilities (short codes, env parsing, timeouts, counters)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, URL_CONFIG, defaults)
export * from "./constants/index.js";
