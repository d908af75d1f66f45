/**
 * Environment Parsing Helpers
 *
 * No validation libraries - just simple parsing with defaults.
 * Missing required variables fail fast at startup.
 */

/**
 * Get required environment variable or throw.
 */
export function required(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
export function optional(
  name: string,
  defaultValue: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default. Unparsable values fall back to the default.
 */
export function optionalInt(
  name: string,
  defaultValue: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse boolean ("true"/"1"/"yes" vs "false"/"0"/"no") with default.
 */
export function optionalBool(
  name: string,
  defaultValue: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (["true", "1", "yes"].includes(value)) return true;
  if (["false", "0", "no"].includes(value)) return false;
  return defaultValue;
}
