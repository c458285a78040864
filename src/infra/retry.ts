export interface BackoffOptions {
  /** Delay for the first attempt in seconds (default: 60) */
  baseDelaySec?: number;
  /** Upper bound before jitter in seconds (default: 3600) */
  maxDelaySec?: number;
  /** Jitter as a fraction of the un-jittered delay, applied both ways (default: 0.2) */
  jitterRatio?: number;
  /** Uniform source in [0, 1), injectable for tests */
  random?: () => number;
}

export const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, "random">> = {
  baseDelaySec: 60,
  maxDelaySec: 3600,
  jitterRatio: 0.2,
};

/**
 * Calculate the delay before the next retry of a failed item.
 *
 * delay = min(max, base * 2^(attempt-1)), then jittered uniformly within
 * ±jitterRatio of itself and clamped to at least one second.
 *
 * @param attempt - 1-based attempt number that just failed
 * @returns Delay in whole seconds
 */
export function calculateBackoff(attempt: number, options: BackoffOptions = {}): number {
  const opts = { ...DEFAULT_BACKOFF, ...options };
  const random = options.random ?? Math.random;

  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(opts.maxDelaySec, opts.baseDelaySec * Math.pow(2, exponent));

  // random() in [0,1) maps to a factor in [-ratio, +ratio)
  const jitter = delay * opts.jitterRatio * (random() * 2 - 1);
  return Math.max(1, Math.round(delay + jitter));
}

/**
 * Compute the earliest time an item may be retried after a failure.
 */
export function nextRetryAt(attempt: number, now: Date, options: BackoffOptions = {}): Date {
  return new Date(now.getTime() + calculateBackoff(attempt, options) * 1000);
}
