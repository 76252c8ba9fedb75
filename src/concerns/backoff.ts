/**
 * Exponential delay for the `attempt`-th consecutive failure (1-based),
 * capped at `maxDelay`. A `baseDelay` of 0 disables the delay entirely.
 */
export function computeBackoff(attempt: number, baseDelay: number, maxDelay: number): number {
  if (baseDelay <= 0) {
    return 0;
  }
  return Math.min(baseDelay * Math.pow(2, Math.max(attempt - 1, 0)), maxDelay);
}

export function normalizeRetry(config: { baseDelayMs?: number; maxDelayMs?: number } = {}): {
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
} {
  const retryBaseDelayMs = Math.max(0, config.baseDelayMs ?? 0);
  const retryMaxDelayMs = Math.max(retryBaseDelayMs, config.maxDelayMs ?? 30000);
  return { retryBaseDelayMs, retryMaxDelayMs };
}
