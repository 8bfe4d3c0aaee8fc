import type { Logger } from 'pino';
import type { Config, CacheSettings } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { TenantContext, TokenRecord } from '../tokens/types.js';
import { LRUCache, type CacheStats } from './memory-cache.js';

export { LRUCache, type CacheStats } from './memory-cache.js';

export interface CacheLayerStats {
  validation: CacheStats | null;
  tenant: CacheStats | null;
  permission: CacheStats | null;
  overallHitRate: number;
  staleWrites: number;
}

function createCache<V>(settings: CacheSettings, clock: Clock): LRUCache<V> | null {
  return settings.enabled ? new LRUCache<V>(settings.max_entries, settings.ttl_seconds * 1000, clock) : null;
}

function validationKey(tokenHash: string, scope: string): string {
  return `${tokenHash}:${scope}`;
}

function permissionKey(tokenHash: string, scopes: readonly string[]): string {
  return `${tokenHash}:${[...scopes].sort().join(',')}`;
}

/**
 * The three validation caches. Token-keyed entries all start with `<hash>:` so a token
 * can be invalidated across caches without knowing which scopes were asked for.
 *
 * Readers that fill the cache from the store take a generation before the read and
 * hand it back on write. Any invalidation in between bumps the generation and the
 * write is dropped, so a record read before a revoke or suspension is never cached
 * after it.
 */
export class CacheLayer {
  private readonly validation: LRUCache<TokenRecord> | null;
  private readonly tenant: LRUCache<TenantContext> | null;
  private readonly permission: LRUCache<ReadonlySet<string>> | null;
  private tokenGen = 0;
  private tenantGen = 0;
  private staleWrites = 0;

  constructor(
    config: Config['cache'],
    private readonly logger: Logger,
    clock: Clock = systemClock
  ) {
    this.validation = createCache(config.validation, clock);
    this.tenant = createCache(config.tenant, clock);
    this.permission = createCache(config.permission, clock);
  }

  getToken(tokenHash: string, scope: string): TokenRecord | undefined {
    return this.validation?.get(validationKey(tokenHash, scope));
  }

  tokenGeneration(): number {
    return this.tokenGen;
  }

  tenantGeneration(): number {
    return this.tenantGen;
  }

  /** Returns false when an invalidation since `generation` dropped the write */
  setToken(
    tokenHash: string,
    scope: string,
    record: TokenRecord,
    generation = this.tokenGen
  ): boolean {
    if (generation !== this.tokenGen) {
      this.staleWrites++;
      return false;
    }
    this.validation?.set(validationKey(tokenHash, scope), record);
    return true;
  }

  getTenant(tenantId: string): TenantContext | undefined {
    return this.tenant?.get(tenantId);
  }

  setTenant(tenant: TenantContext, generation = this.tenantGen): boolean {
    if (generation !== this.tenantGen) {
      this.staleWrites++;
      return false;
    }
    this.tenant?.set(tenant.tenantId, tenant);
    return true;
  }

  getPermissions(tokenHash: string, scopes: readonly string[]): ReadonlySet<string> | undefined {
    return this.permission?.get(permissionKey(tokenHash, scopes));
  }

  setPermissions(tokenHash: string, scopes: readonly string[]): ReadonlySet<string> {
    const granted: ReadonlySet<string> = new Set(scopes);
    this.permission?.set(permissionKey(tokenHash, scopes), granted);
    return granted;
  }

  /** Drop every validation and permission entry of a token. Returns the number removed. */
  invalidateToken(tokenHash: string): number {
    this.tokenGen++;
    const prefix = `${tokenHash}:`;
    const removed =
      (this.validation?.deleteByPrefix(prefix) ?? 0) + (this.permission?.deleteByPrefix(prefix) ?? 0);
    if (removed > 0) {
      this.logger.debug({ tokenHash: tokenHash.substring(0, 8), removed }, 'Invalidated token cache entries');
    }
    return removed;
  }

  invalidateTenant(tenantId: string): boolean {
    this.tenantGen++;
    return this.tenant?.delete(tenantId) ?? false;
  }

  cleanupExpired(): { validation: number; tenant: number; permission: number } {
    const result = {
      validation: this.validation?.cleanupExpired() ?? 0,
      tenant: this.tenant?.cleanupExpired() ?? 0,
      permission: this.permission?.cleanupExpired() ?? 0,
    };
    if (result.validation > 0 || result.tenant > 0 || result.permission > 0) {
      this.logger.debug(result, 'Cleaned up expired cache entries');
    }
    return result;
  }

  clear(): void {
    this.validation?.clear();
    this.tenant?.clear();
    this.permission?.clear();
  }

  stats(): CacheLayerStats {
    const validation = this.validation?.stats() ?? null;
    const tenant = this.tenant?.stats() ?? null;
    const permission = this.permission?.stats() ?? null;

    let hits = 0;
    let lookups = 0;
    for (const stats of [validation, tenant, permission]) {
      if (stats) {
        hits += stats.hits;
        lookups += stats.hits + stats.misses;
      }
    }

    return {
      validation,
      tenant,
      permission,
      overallHitRate: lookups === 0 ? 0 : hits / lookups,
      staleWrites: this.staleWrites,
    };
  }
}
