/**
 * Shared Type Definitions
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Outcome codes for client-facing operations.
 *
 * - INVALID_URL / INVALID_ALIAS: client error, fix the input
 * - ALIAS_TAKEN: conflict, retry with a different alias
 * - CODE_SPACE_EXHAUSTED: capacity error, needs longer codes or backoff
 * - NOT_FOUND: absent OR expired (deliberately indistinguishable)
 * - RATE_LIMITED: retry after the current window
 * - STORE_UNAVAILABLE: durable store failed for this request
 */
export const ErrorCode = {
  INVALID_URL: "INVALID_URL",
  INVALID_ALIAS: "INVALID_ALIAS",
  ALIAS_TAKEN: "ALIAS_TAKEN",
  CODE_SPACE_EXHAUSTED: "CODE_SPACE_EXHAUSTED",
  NOT_FOUND: "NOT_FOUND",
  RATE_LIMITED: "RATE_LIMITED",
  STORE_UNAVAILABLE: "STORE_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Failed operation outcome. Services return these instead of throwing.
 */
export interface Failure<C extends ErrorCode = ErrorCode> {
  success: false;
  errorCode: C;
  error: string;
}

/**
 * Build a failure outcome.
 */
export function failure<C extends ErrorCode>(errorCode: C, error: string): Failure<C> {
  return { success: false, errorCode, error };
}

// =============================================================================
// Clock
// =============================================================================

/**
 * Injectable time source. Defaults to `() => new Date()` everywhere.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
