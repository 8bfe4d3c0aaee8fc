import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';

/** Failures per IP that still raise the risk score; older ones are not kept */
export const MAX_COUNTED_FAILURES = 5;

export interface SignalTrackerOptions {
  failureWindowMs?: number;
  maxFailuresPerIp?: number;
  maxTrackedTokens?: number;
  maxIpsPerToken?: number;
  maxTrackedIps?: number;
  clock?: Clock;
}

/**
 * In-memory history feeding the risk scorer: failed validations per client IP and the
 * IPs each token was used from. Every map is bounded; the oldest key goes first.
 */
export class SignalTracker {
  private readonly failures = new Map<string, number[]>();
  private readonly tokenIps = new Map<string, Set<string>>();
  private readonly failureWindowMs: number;
  private readonly maxFailuresPerIp: number;
  private readonly maxTrackedTokens: number;
  private readonly maxIpsPerToken: number;
  private readonly maxTrackedIps: number;
  private readonly clock: Clock;

  constructor(options: SignalTrackerOptions = {}) {
    this.failureWindowMs = options.failureWindowMs ?? 15 * 60 * 1000;
    this.maxFailuresPerIp = options.maxFailuresPerIp ?? MAX_COUNTED_FAILURES;
    this.maxTrackedTokens = options.maxTrackedTokens ?? 10000;
    this.maxIpsPerToken = options.maxIpsPerToken ?? 16;
    this.maxTrackedIps = options.maxTrackedIps ?? 10000;
    this.clock = options.clock ?? systemClock;
  }

  recordFailure(ip: string): void {
    const now = this.clock();
    const timestamps = this.recent(ip, now);
    timestamps.push(now);
    if (timestamps.length > this.maxFailuresPerIp) {
      timestamps.splice(0, timestamps.length - this.maxFailuresPerIp);
    }
    this.failures.delete(ip);
    this.failures.set(ip, timestamps);
    evictOldest(this.failures, this.maxTrackedIps);
  }

  recentFailures(ip: string): number {
    return this.recent(ip, this.clock()).length;
  }

  isKnownIp(tokenId: string, ip: string): boolean {
    return this.tokenIps.get(tokenId)?.has(ip) ?? false;
  }

  rememberIp(tokenId: string, ip: string): void {
    const ips = this.tokenIps.get(tokenId) ?? new Set<string>();
    if (!ips.has(ip)) {
      ips.add(ip);
      if (ips.size > this.maxIpsPerToken) {
        const oldest = ips.values().next();
        if (!oldest.done) ips.delete(oldest.value);
      }
    }
    this.tokenIps.delete(tokenId);
    this.tokenIps.set(tokenId, ips);
    evictOldest(this.tokenIps, this.maxTrackedTokens);
  }

  forgetToken(tokenId: string): void {
    this.tokenIps.delete(tokenId);
  }

  /** Drop failure records that left the window */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const ip of [...this.failures.keys()]) {
      const timestamps = this.recent(ip, now);
      if (timestamps.length === 0) {
        this.failures.delete(ip);
        removed++;
      } else {
        this.failures.set(ip, timestamps);
      }
    }
    return removed;
  }

  stats(): { trackedIps: number; trackedTokens: number } {
    return { trackedIps: this.failures.size, trackedTokens: this.tokenIps.size };
  }

  private recent(ip: string, now: number): number[] {
    const cutoff = now - this.failureWindowMs;
    return (this.failures.get(ip) ?? []).filter((timestamp) => timestamp > cutoff);
  }
}

function evictOldest<V>(map: Map<string, V>, maxSize: number): void {
  while (map.size > maxSize) {
    const oldest = map.keys().next();
    if (oldest.done) return;
    map.delete(oldest.value);
  }
}
