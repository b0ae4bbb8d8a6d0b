// Exponential backoff: attempt is 1-indexed; attempt=1 waits initialIntervalMs,
// attempt=2 waits multiplier x that, and so on up to maxInterval.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = 1000,
  backoffMultiplier: number = 4.0,
  maxInterval: number = 60000,
  random: () => number = Math.random,
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, Math.max(attempt, 1) - 1);
  delay = Math.min(delay, maxInterval);
  // ±10% jitter to avoid thundering herd
  const jitter = delay * 0.1;
  const randomJitter = random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}

const MIN_RETRY_AFTER_MS = 1000;

/**
 * Reads a rate-limit wait hint from response headers.
 * Understands `Retry-After` (seconds or HTTP date) and `X-RateLimit-Reset`
 * (seconds from now, or an epoch in seconds). Returns null when no hint is present.
 */
export function parseRetryAfter(headers: Record<string, string>, now: number = Date.now()): number | null {
  const lower: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    lower[key.toLowerCase()] = value;
  }

  const retryAfter = lower['retry-after']?.trim();
  if (retryAfter) {
    if (/^\d+(\.\d+)?$/.test(retryAfter)) {
      return Math.max(Math.round(parseFloat(retryAfter) * 1000), MIN_RETRY_AFTER_MS);
    }
    const at = Date.parse(retryAfter);
    if (!Number.isNaN(at)) {
      return Math.max(at - now, MIN_RETRY_AFTER_MS);
    }
  }

  const reset = lower['x-ratelimit-reset']?.trim() ?? lower['x-ratelimit-reset-after']?.trim();
  if (reset && /^\d+(\.\d+)?$/.test(reset)) {
    const value = parseFloat(reset);
    // large values are epoch seconds
    const waitMs = value > 1e9 ? value * 1000 - now : value * 1000;
    return Math.max(Math.round(waitMs), MIN_RETRY_AFTER_MS);
  }

  return null;
}
