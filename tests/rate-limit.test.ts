import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../src/ratelimit/index.js';
import { FakeClock, MINUTE, testConfig } from './helpers.js';

describe('RateLimiter', () => {
  let clock: FakeClock;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = new FakeClock();
    const config = testConfig({
      rate_limits: { window_seconds: 600, tiers: { STANDARD: 3, MEDIUM: 5, HIGH: 10 } },
    });
    limiter = new RateLimiter(config.rate_limits, clock.now);
  });

  it('should use the tier of the security level', () => {
    expect(limiter.limitFor('STANDARD')).toBe(3);
    expect(limiter.limitFor('MEDIUM')).toBe(5);
    expect(limiter.limitFor('HIGH')).toBe(10);
  });

  it('should default to 1000 / 5000 / 10000 per hour', () => {
    const defaults = testConfig().rate_limits;

    expect(defaults.window_seconds).toBe(3600);
    expect(defaults.tiers).toEqual({ STANDARD: 1000, MEDIUM: 5000, HIGH: 10000 });
  });

  it('should reject the (N+1)-th request in the window', () => {
    expect(limiter.consume('token-1', 'STANDARD')).toMatchObject({ allowed: true, remaining: 2 });
    expect(limiter.consume('token-1', 'STANDARD')).toMatchObject({ allowed: true, remaining: 1 });
    expect(limiter.consume('token-1', 'STANDARD')).toMatchObject({ allowed: true, remaining: 0 });
    expect(limiter.consume('token-1', 'STANDARD')).toMatchObject({ allowed: false, remaining: 0 });
  });

  it('should not count rejected requests', () => {
    for (let i = 0; i < 5; i++) {
      limiter.consume('token-1', 'STANDARD');
    }

    expect(limiter.count('token-1')).toBe(3);
  });

  it('should keep separate windows per key', () => {
    for (let i = 0; i < 3; i++) {
      limiter.consume('token-1', 'STANDARD');
    }

    expect(limiter.consume('token-2', 'STANDARD').allowed).toBe(true);
  });

  it('should roll the window forward', () => {
    limiter.consume('token-1', 'STANDARD');
    clock.advance(5 * MINUTE);
    limiter.consume('token-1', 'STANDARD');
    limiter.consume('token-1', 'STANDARD');
    expect(limiter.consume('token-1', 'STANDARD').allowed).toBe(false);

    // The first request leaves the window, the other two are still in it
    clock.advance(5 * MINUTE);
    expect(limiter.consume('token-1', 'STANDARD')).toMatchObject({ allowed: true, remaining: 0 });
  });

  it('should report when the oldest request leaves the window', () => {
    const decision = limiter.consume('token-1', 'STANDARD');

    expect(decision.resetAt).toBe(clock.current + 10 * MINUTE);
  });

  it('should sweep keys with empty windows', () => {
    limiter.consume('token-1', 'STANDARD');
    clock.advance(5 * MINUTE);
    limiter.consume('token-2', 'STANDARD');
    clock.advance(5 * MINUTE);

    expect(limiter.sweep()).toBe(1);
    expect(limiter.size()).toBe(1);
  });
});
