import { describe, it, expect, beforeEach } from 'vitest';
import { CacheLayer } from '../src/cache/index.js';
import type { TenantContext, TokenRecord } from '../src/tokens/types.js';
import { FakeClock, T0, silentLogger, testConfig } from './helpers.js';

function record(overrides: Partial<TokenRecord> = {}): TokenRecord {
  return {
    tokenId: 'token-1',
    tokenHash: 'hash-a',
    tenantId: 'tenant-a',
    scopes: ['read', 'write'],
    securityLevel: 'STANDARD',
    issuedAt: new Date(T0),
    expiresAt: new Date(T0 + 86400 * 1000),
    extensionCount: 0,
    ...overrides,
  };
}

const tenantA: TenantContext = {
  tenantId: 'tenant-a',
  isolationBoundary: 'tenant:tenant-a',
  status: 'active',
};

describe('CacheLayer', () => {
  let clock: FakeClock;
  let cache: CacheLayer;

  beforeEach(() => {
    clock = new FakeClock();
    cache = new CacheLayer(testConfig().cache, silentLogger, clock.now);
  });

  it('should key validation entries by token hash and scope', () => {
    cache.setToken('hash-a', 'read', record());

    expect(cache.getToken('hash-a', 'read')?.tokenId).toBe('token-1');
    expect(cache.getToken('hash-a', 'write')).toBeUndefined();
  });

  it('should expire validation entries after 300 seconds', () => {
    cache.setToken('hash-a', 'read', record());

    clock.advance(299 * 1000);
    expect(cache.getToken('hash-a', 'read')).toBeDefined();

    clock.advance(1000);
    expect(cache.getToken('hash-a', 'read')).toBeUndefined();
  });

  it('should expire tenant entries after 600 seconds', () => {
    cache.setTenant(tenantA);

    clock.advance(599 * 1000);
    expect(cache.getTenant('tenant-a')).toEqual(tenantA);

    clock.advance(1000);
    expect(cache.getTenant('tenant-a')).toBeUndefined();
  });

  it('should key permissions by the sorted scope set', () => {
    const granted = cache.setPermissions('hash-a', ['write', 'read']);

    expect(granted.has('read')).toBe(true);
    expect(cache.getPermissions('hash-a', ['read', 'write'])).toBe(granted);
  });

  it('should invalidate every entry of a token', () => {
    cache.setToken('hash-a', 'read', record());
    cache.setToken('hash-a', 'write', record());
    cache.setPermissions('hash-a', ['read', 'write']);
    cache.setToken('hash-b', 'read', record({ tokenId: 'token-2', tokenHash: 'hash-b' }));

    expect(cache.invalidateToken('hash-a')).toBe(3);
    expect(cache.getToken('hash-a', 'read')).toBeUndefined();
    expect(cache.getPermissions('hash-a', ['read', 'write'])).toBeUndefined();
    expect(cache.getToken('hash-b', 'read')?.tokenId).toBe('token-2');
  });

  it('should invalidate a tenant', () => {
    cache.setTenant(tenantA);

    expect(cache.invalidateTenant('tenant-a')).toBe(true);
    expect(cache.getTenant('tenant-a')).toBeUndefined();
  });

  it('should drop a token write taken before an invalidation', () => {
    const generation = cache.tokenGeneration();
    cache.invalidateToken('hash-a');

    expect(cache.setToken('hash-a', 'read', record(), generation)).toBe(false);
    expect(cache.getToken('hash-a', 'read')).toBeUndefined();

    expect(cache.setToken('hash-a', 'read', record(), cache.tokenGeneration())).toBe(true);
    expect(cache.getToken('hash-a', 'read')?.tokenId).toBe('token-1');
  });

  it('should drop a tenant write taken before an invalidation', () => {
    const generation = cache.tenantGeneration();
    cache.invalidateTenant('tenant-a');

    expect(cache.setTenant(tenantA, generation)).toBe(false);
    expect(cache.getTenant('tenant-a')).toBeUndefined();
    expect(cache.stats().staleWrites).toBe(1);
  });

  it('should sweep expired entries of all caches', () => {
    cache.setToken('hash-a', 'read', record());
    cache.setPermissions('hash-a', ['read']);
    cache.setTenant(tenantA);

    clock.advance(300 * 1000);

    expect(cache.cleanupExpired()).toEqual({ validation: 1, tenant: 0, permission: 1 });
  });

  it('should report per-cache and overall hit rates', () => {
    cache.setToken('hash-a', 'read', record());
    cache.getToken('hash-a', 'read');
    cache.getToken('hash-a', 'write');
    cache.getTenant('tenant-a');
    cache.getTenant('tenant-a');

    const stats = cache.stats();
    expect(stats.validation?.hits).toBe(1);
    expect(stats.validation?.misses).toBe(1);
    expect(stats.tenant?.misses).toBe(2);
    expect(stats.overallHitRate).toBe(0.25);
  });

  it('should skip disabled caches', () => {
    const disabled = new CacheLayer(
      testConfig({ cache: { validation: { enabled: false } } }).cache,
      silentLogger,
      clock.now
    );

    disabled.setToken('hash-a', 'read', record());

    expect(disabled.getToken('hash-a', 'read')).toBeUndefined();
    expect(disabled.stats().validation).toBeNull();
    expect(disabled.stats().tenant).not.toBeNull();
  });
});
