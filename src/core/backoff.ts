export interface BackoffOptions {
  baseMs: number;
  capMs: number;
}

/**
 * Delay before reconnect attempt `attempt` (0-based count of failures so far):
 * `min(cap, base * 2^attempt)` plus up to a quarter of that as jitter.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = options.baseMs * 2 ** Math.max(0, attempt);
  const delay = Math.min(options.capMs, exponential);
  const jitter = Math.min(1, Math.max(0, random())) * (delay / 4);
  return Math.floor(delay + jitter);
}
