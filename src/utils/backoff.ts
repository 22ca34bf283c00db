export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  // Fraction of the delay that may be shaved off at random, 0..1
  jitterRatio: number;
}

/**
 * Exponential backoff with jitter. Attempt numbers start at 1:
 * base, 2×base, 4×base ... capped at maxDelayMs, then reduced by up to
 * jitterRatio of itself.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
  const jitter = Math.min(1, Math.max(0, options.jitterRatio)) * random();
  return Math.round(capped * (1 - jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
