const NON_NEGATIVE_INT = /^\d+$/;

/**
 * Parse a stored counter value. Absent, malformed or unsafe values read as 0.
 */
export function parseCounter(value: string | null | undefined): number {
  if (value == null) return 0;
  const trimmed = value.trim();
  if (!NON_NEGATIVE_INT.test(trimmed)) return 0;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}
