/**
 * Fixed-window rate limit counters held in process memory.
 * Counts are per process; a restart resets every window.
 */

import type { IRateLimitStore, RateLimitHit } from './IRateLimitStore.js';

interface Window {
  count: number;
  resetAt: number;
}

const SWEEP_EVERY = 500;

export class InMemoryRateLimitStore implements IRateLimitStore {
  private windows = new Map<string, Window>();
  private calls = 0;

  async increment(key: string, windowSeconds: number): Promise<RateLimitHit> {
    const now = Math.floor(Date.now() / 1000);

    if (++this.calls % SWEEP_EVERY === 0) this.sweep(now);

    const current = this.windows.get(key);
    if (!current || current.resetAt <= now) {
      const fresh = { count: 1, resetAt: now + windowSeconds };
      this.windows.set(key, fresh);
      return { ...fresh };
    }

    current.count++;
    return { ...current };
  }

  /** Number of live windows. */
  get size(): number {
    return this.windows.size;
  }

  clear(): void {
    this.windows.clear();
    this.calls = 0;
  }

  // Expired windows are dropped lazily so the map stays bounded by active keys.
  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }
}
