/**
 * Shared Utility Functions
 */

export {
  generateRandomCode,
  validateCustomAlias,
  isLookupableCode,
  isValidUrl,
} from "./shortcode.js";

export type { ValidationResult } from "./shortcode.js";

export { required, optional, optionalInt, optionalBool } from "./env.js";
export { withTimeout } from "./timeout.js";
export { parseCounter } from "./counter.js";
