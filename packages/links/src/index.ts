/**
 * @linkpulse/links - Link Registration, Resolution and Rate Limiting
 */

export {
  LinkService,
  DEFAULT_LINK_SERVICE_CONFIG,
  type LinkServiceConfig,
  type LinkServiceDeps,
  type PendingHitsReader,
  type RegisterInput,
  type RegisteredLink,
  type LinkStats,
  type RegisterError,
  type LookupError,
  type RegisterResult,
  type ResolveResult,
  type StatsResult,
} from "./link-service.js";

export {
  FixedWindowRateLimiter,
  type RateLimiterOptions,
  type RateLimitResult,
  type RateLimitFailureMode,
} from "./rate-limiter.js";

export { computeExpiresAt, isExpired, cacheTtlSeconds } from "./expiry.js";
