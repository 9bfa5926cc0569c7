export const MIN_BACKOFF_SECONDS = 2;
export const MAX_BACKOFF_SECONDS = 10;

/** Un-jittered delay before the attempt following `attempt` (1-based). */
export function backoffSeconds(attempt: number): number {
  return Math.min(MAX_BACKOFF_SECONDS, Math.max(MIN_BACKOFF_SECONDS, 2 ** attempt));
}

/**
 * Applies a jitter factor in [0.5, 1.0] so concurrent callers that failed
 * together do not retry together. The result stays within the floor and
 * ceiling.
 */
export function computeBackoffWithJitter(attempt: number, random: () => number = Math.random): number {
  const jitter = 0.5 + random() * 0.5;
  const delayMs = Math.round(backoffSeconds(attempt) * 1000 * jitter);
  return Math.min(MAX_BACKOFF_SECONDS * 1000, Math.max(MIN_BACKOFF_SECONDS * 1000, delayMs));
}
