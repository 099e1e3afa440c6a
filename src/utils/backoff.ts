export interface BackoffOptions {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** 0 disables jitter; 1 spreads the delay over [50%, 100%]. */
  readonly jitter?: number;
}

/**
 * Delay before the next attempt after `attempt` failures (1-based).
 * Exponential in the attempt count and capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  const exponential = opts.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exponential, opts.maxDelayMs);
  const jitter = opts.jitter ?? 0;
  if (jitter <= 0) return capped;
  return capped * (1 - jitter * 0.5 * Math.random());
}

/** Queue-position penalty for a prompt that has failed `retryCount` times. */
export function retryPenalty(retryCount: number): number {
  return retryCount <= 0 ? 0 : 2 ** retryCount - 1;
}
