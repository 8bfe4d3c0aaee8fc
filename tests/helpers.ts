import pino from 'pino';
import { parseConfig, type Config } from '../src/config/index.js';
import { initializeSQLite, IN_MEMORY_PATH, type SQLiteContext } from '../src/db/index.js';
import {
  createStorage,
  type AuditRepository,
  type GatewayStorage,
} from '../src/storage/index.js';
import { AuditLogger, type AuditEvent, type AuditQuery } from '../src/audit/index.js';
import { CacheLayer } from '../src/cache/index.js';
import { ExtensionManager } from '../src/extension/index.js';
import { RateLimiter } from '../src/ratelimit/index.js';
import { SignalTracker } from '../src/risk/index.js';
import { TokenStore } from '../src/tokens/store.js';
import type { IssueRequest, IssuedToken } from '../src/tokens/types.js';
import { EnhancedValidator, LegacyValidator } from '../src/validation/index.js';

export const TEST_SECRET = 'test-secret-0123456789';
export const T0 = Date.parse('2026-01-01T00:00:00.000Z');
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

// Create a silent logger for tests
export const silentLogger = pino({ level: 'silent' });

export type ConfigOverrides = Record<string, Record<string, unknown>>;

/**
 * Test configuration: in-memory SQLite, fast retries, placeholder secret.
 * Overrides are merged one section deep.
 */
export function testConfig(overrides: ConfigOverrides = {}): Config {
  const base: ConfigOverrides = {
    storage: {
      type: 'sqlite',
      path: IN_MEMORY_PATH,
      retry: { attempts: 3, base_delay_ms: 1, max_delay_ms: 2 },
    },
    logging: { level: 'silent' },
    tokens: { hash_secret: TEST_SECRET },
  };
  const merged: ConfigOverrides = { ...base };
  for (const [section, values] of Object.entries(overrides)) {
    merged[section] = { ...(base[section] ?? {}), ...values };
  }
  return parseConfig(merged);
}

export class FakeClock {
  constructor(public current: number = T0) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestDatabase {
  context: SQLiteContext;
  storage: GatewayStorage;
}

export function openTestDatabase(): TestDatabase {
  const context = initializeSQLite(IN_MEMORY_PATH);
  return { context, storage: createStorage(context) };
}

export interface Harness {
  config: Config;
  clock: FakeClock;
  store: TokenStore;
  cache: CacheLayer;
  audit: AuditLogger;
  rateLimiter: RateLimiter;
  signals: SignalTracker;
  extension: ExtensionManager;
  enhanced: EnhancedValidator;
  legacy: LegacyValidator;
}

/**
 * Wire the validation components on a test database, the same way the gateway does.
 */
export function createHarness(storage: GatewayStorage, overrides: ConfigOverrides = {}): Harness {
  const config = testConfig(overrides);
  const clock = new FakeClock();
  const cache = new CacheLayer(config.cache, silentLogger, clock.now);
  const store = new TokenStore(storage, config, silentLogger, {
    clock: clock.now,
    onTokenChanged: (tokenHash) => {
      cache.invalidateToken(tokenHash);
    },
    onTenantChanged: (tenantId) => {
      cache.invalidateTenant(tenantId);
    },
  });
  const audit = new AuditLogger(storage.audit, config.audit, silentLogger, clock.now);
  const rateLimiter = new RateLimiter(config.rate_limits, clock.now);
  const signals = new SignalTracker({ clock: clock.now });
  const extension = new ExtensionManager(store, audit, config.extension, silentLogger, clock.now);
  const deps = {
    store,
    cache,
    rateLimiter,
    signals,
    extension,
    audit,
    logger: silentLogger,
    clock: clock.now,
  };

  return {
    config,
    clock,
    store,
    cache,
    audit,
    rateLimiter,
    signals,
    extension,
    enhanced: new EnhancedValidator(config, deps),
    legacy: new LegacyValidator(deps),
  };
}

export async function issueToken(
  store: TokenStore,
  request: Partial<IssueRequest> = {}
): Promise<IssuedToken> {
  const outcome = await store.issue({ tenantId: 'tenant-a', scopes: ['read'], ...request });
  if (!outcome.ok) {
    throw new Error(`issue failed: ${outcome.kind}`);
  }
  return outcome.value;
}

/**
 * Audit repository kept in memory. `gate` holds appends back until it resolves.
 */
export class MemoryAuditRepository implements AuditRepository {
  events: AuditEvent[] = [];
  failures = 0;
  gate: Promise<void> | null = null;

  async append(events: readonly AuditEvent[]): Promise<void> {
    if (this.gate) {
      await this.gate;
    }
    if (this.failures > 0) {
      this.failures--;
      throw new Error('disk full');
    }
    this.events.push(...events);
  }

  async query(_query: AuditQuery): Promise<AuditEvent[]> {
    return [...this.events].reverse();
  }
}
