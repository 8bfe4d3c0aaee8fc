import type { RateLimitConfig, SecurityLevel } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  /** Requests left in the window after this one */
  remaining: number;
  /** Epoch ms at which the oldest counted request leaves the window */
  resetAt: number;
}

/**
 * Rolling-window request counter per key (token id). Each key keeps the timestamps of
 * the requests it was allowed inside the window; check and consume happen in one
 * synchronous call, so concurrent requests cannot both take the last slot.
 */
export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly windowMs: number;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.windowMs = config.window_seconds * 1000;
  }

  limitFor(level: SecurityLevel): number {
    return this.config.tiers[level];
  }

  consume(key: string, level: SecurityLevel): RateLimitDecision {
    const now = this.clock();
    const limit = this.limitFor(level);
    const timestamps = this.prune(key, now);

    if (timestamps.length >= limit) {
      return { allowed: false, limit, remaining: 0, resetAt: timestamps[0] + this.windowMs };
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return {
      allowed: true,
      limit,
      remaining: limit - timestamps.length,
      resetAt: timestamps[0] + this.windowMs,
    };
  }

  /** Requests counted in the current window, without consuming one */
  count(key: string): number {
    return this.prune(key, this.clock()).length;
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  /** Drop keys whose window holds no request anymore */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now).length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.windows.size;
  }

  private prune(key: string, now: number): number[] {
    const timestamps = this.windows.get(key) ?? [];
    const cutoff = now - this.windowMs;
    let first = 0;
    while (first < timestamps.length && timestamps[first] <= cutoff) {
      first++;
    }
    if (first > 0) {
      timestamps.splice(0, first);
    }
    return timestamps;
  }
}
