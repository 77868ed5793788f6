/**
 * Capped exponential backoff.
 */

/**
 * Seconds to wait after the attempt at `attemptIndex` (zero-based):
 * `base * 2^attemptIndex`, never more than `cap`.
 */
export function computeBackoff(attemptIndex: number, base: number, cap: number): number {
  return Math.min(base * 2 ** attemptIndex, cap);
}

/**
 * Reads a Retry-After header given in seconds.
 * Falls back when the header is missing, negative or not a number.
 */
export function parseRetryAfter(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return fallback;
  }
  return seconds;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
