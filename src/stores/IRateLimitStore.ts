/**
 * Counter storage for fixed-window rate limiting.
 */

export interface RateLimitHit {
  /** Requests seen in the current window, including this one. */
  count: number;
  /** Unix time (seconds) at which the window resets. */
  resetAt: number;
}

export interface IRateLimitStore {
  /** Count one request against `key`, opening a new window if the last one expired. */
  increment(key: string, windowSeconds: number): Promise<RateLimitHit>;
}
