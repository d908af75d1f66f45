/**
 * Wrap a promise with a timeout.
 * Returns null on timeout instead of throwing.
 *
 * Timeout = cache miss / dropped write on hot paths, so callers treat it
 * the same way as a missing key. The wrapped promise keeps running; its
 * eventual rejection is absorbed by the race.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number
): Promise<T | null> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<null>((resolve) => {
    timeoutId = setTimeout(() => resolve(null), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
