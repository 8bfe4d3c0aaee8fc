import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TokenGateway } from '../src/gateway.js';
import type { GatewayStorage } from '../src/storage/index.js';
import type { ValidationRequest } from '../src/validation/index.js';
import {
  FakeClock,
  HOUR,
  MINUTE,
  T0,
  openTestDatabase,
  silentLogger,
  testConfig,
  type ConfigOverrides,
  type TestDatabase,
} from './helpers.js';

describe('TokenGateway', () => {
  let db: TestDatabase;
  let clock: FakeClock;
  let gateway: TokenGateway;

  function create(overrides: ConfigOverrides = {}, storage: GatewayStorage = db.storage) {
    gateway = new TokenGateway(testConfig(overrides), storage, silentLogger, { clock: clock.now });
    return gateway;
  }

  async function issue(tenantId = 'tenant-a', scopes = ['read'], ttlSeconds = 24 * 3600) {
    const outcome = await gateway.issue({ tenantId, scopes, ttlSeconds });
    if (!outcome.ok) throw new Error(`issue failed: ${outcome.kind}`);
    return outcome.value;
  }

  function request(token: string, overrides: Partial<ValidationRequest> = {}): ValidationRequest {
    return {
      token,
      requiredScope: 'read',
      tenantId: 'tenant-a',
      clientIp: '10.0.0.1',
      userAgent: 'Mozilla/5.0',
      ...overrides,
    };
  }

  beforeEach(() => {
    db = openTestDatabase();
    clock = new FakeClock();
  });

  afterEach(async () => {
    await gateway.close();
    await db.context.close();
  });

  describe('token lifecycle on the enhanced path', () => {
    beforeEach(() => {
      create({ zero_trust: { fail_safe_mode: false } });
    });

    it('should extend near expiry, expire untouched tokens and block other tenants', async () => {
      const active = await issue();
      const idle = await issue();

      clock.advance(23 * HOUR + 50 * MINUTE);
      const renewed = await gateway.validate(request(active.token));
      expect(renewed.ok).toBe(true);
      if (renewed.ok) {
        expect(renewed.value.tenant.tenantId).toBe('tenant-a');
        expect(renewed.value.grantedScopes).toEqual(['read']);
        expect(renewed.value.extended).toBe(true);
        expect(renewed.value.expiresAt.getTime()).toBe(T0 + 48 * HOUR);
      }

      clock.advance(70 * MINUTE);
      expect(await gateway.validate(request(idle.token))).toEqual({
        ok: false,
        kind: 'ExpiredToken',
      });
      expect(await gateway.validate(request(active.token, { tenantId: 'tenant-b' }))).toEqual({
        ok: false,
        kind: 'CrossTenantAttempt',
      });

      await gateway.orchestrator.settled();
      const extended = await gateway.queryAudit({ kind: 'extended' });
      expect(extended.ok && extended.value.map((e) => e.tokenId)).toEqual([active.tokenId]);
      const critical = await gateway.queryAudit({ severity: 'critical' });
      expect(critical.ok && critical.value.map((e) => e.outcome)).toEqual(['CrossTenantAttempt']);
    });

    it('should reject the request after the tier limit', async () => {
      create({ zero_trust: { fail_safe_mode: false }, rate_limits: { tiers: { STANDARD: 2 } } });
      const issued = await issue();

      expect((await gateway.validate(request(issued.token))).ok).toBe(true);
      expect((await gateway.validate(request(issued.token))).ok).toBe(true);
      expect(await gateway.validate(request(issued.token))).toEqual({
        ok: false,
        kind: 'RateLimitExceeded',
      });
    });

    it('should reject a revoked token and audit the revocation', async () => {
      const issued = await issue();
      expect((await gateway.validate(request(issued.token))).ok).toBe(true);

      expect(await gateway.revoke(issued.tokenId)).toEqual({ ok: true, value: true });
      expect(await gateway.revoke(issued.tokenId)).toEqual({ ok: true, value: false });

      expect(await gateway.validate(request(issued.token))).toEqual({
        ok: false,
        kind: 'InvalidToken',
      });
      const revoked = await gateway.queryAudit({ kind: 'revoked' });
      expect(revoked.ok && revoked.value).toHaveLength(1);
    });

    it('should reject tokens of a suspended tenant until it is reactivated', async () => {
      const issued = await issue();

      expect(await gateway.setTenantStatus('tenant-a', 'suspended')).toEqual({
        ok: true,
        value: true,
      });
      expect(await gateway.validate(request(issued.token))).toEqual({
        ok: false,
        kind: 'InvalidToken',
      });

      await gateway.setTenantStatus('tenant-a', 'active');
      expect((await gateway.validate(request(issued.token))).ok).toBe(true);
    });

    it('should extend a token on request', async () => {
      const issued = await issue();

      expect(await gateway.extend(issued.tokenId)).toEqual({ ok: true, value: true });
      const record = await gateway.store.findById(issued.tokenId);
      expect(record?.expiresAt.getTime()).toBe(T0 + 48 * HOUR);
      expect(record?.scopes).toEqual(['read']);
    });
  });

  describe('shadow mode', () => {
    it('should serve the legacy answer and record the disagreement', async () => {
      create();
      const issued = await issue();
      await gateway.setTenantStatus('tenant-a', 'suspended');

      const outcome = await gateway.validate(request(issued.token));

      expect(outcome.ok && outcome.value.path).toBe('legacy');
      await gateway.orchestrator.settled();
      expect(gateway.stats().orchestrator).toMatchObject({
        servedPath: 'legacy',
        comparisons: 1,
        discrepancies: 1,
      });
      const discrepancies = await gateway.queryAudit({ kind: 'discrepancy' });
      expect(discrepancies.ok && discrepancies.value[0].detail).toEqual({
        legacy: 'valid',
        enhanced: 'InvalidToken',
        served: 'legacy',
      });
    });

    it('should block a cross-tenant token on the legacy path with one critical event', async () => {
      create();
      const issued = await issue();

      expect(await gateway.validate(request(issued.token, { tenantId: 'tenant-b' }))).toEqual({
        ok: false,
        kind: 'CrossTenantAttempt',
      });
      await gateway.orchestrator.settled();
      expect(gateway.stats().orchestrator).toMatchObject({ comparisons: 1, discrepancies: 0 });

      const critical = await gateway.queryAudit({ severity: 'critical' });
      expect(critical.ok && critical.value.map((e) => [e.path, e.outcome])).toEqual([
        ['legacy', 'CrossTenantAttempt'],
      ]);
      const decisions = await gateway.queryAudit({ kind: 'decision' });
      expect(decisions.ok && decisions.value).toHaveLength(2);
    });

    it('should report the budget the enhanced path has consumed', async () => {
      create({ rate_limits: { tiers: { STANDARD: 2 } } });
      const issued = await issue();

      for (let i = 0; i < 2; i++) {
        expect((await gateway.validate(request(issued.token))).ok).toBe(true);
        await gateway.orchestrator.settled();
      }
      const third = await gateway.validate(request(issued.token));

      expect(third.ok && third.value.rateLimitRemaining).toBe(0);
      await gateway.orchestrator.settled();
      expect(gateway.stats().orchestrator.discrepancies).toBe(1);
    });
  });

  describe('without parallel validation', () => {
    it('should still audit a cross-tenant attempt as critical', async () => {
      create({ zero_trust: { parallel_validation: { enabled: false } } });
      const issued = await issue();

      expect(await gateway.validate(request(issued.token, { tenantId: 'tenant-b' }))).toEqual({
        ok: false,
        kind: 'CrossTenantAttempt',
      });
      await gateway.orchestrator.settled();

      const critical = await gateway.queryAudit({ severity: 'critical' });
      expect(critical.ok && critical.value.map((e) => e.outcome)).toEqual(['CrossTenantAttempt']);
      expect(gateway.stats().orchestrator.comparisons).toBe(0);
    });

    it('should not validate a token revoked while a request was in flight', async () => {
      create({ zero_trust: { fail_safe_mode: false, parallel_validation: { enabled: false } } });
      const issued = await issue();
      const inFlight = gateway.validate(request(issued.token));
      await gateway.revoke(issued.tokenId);
      await inFlight;

      expect(await gateway.validate(request(issued.token))).toEqual({
        ok: false,
        kind: 'InvalidToken',
      });
    });
  });

  describe('issue', () => {
    it('should audit the issued token without its value', async () => {
      create();
      const issued = await issue('tenant-a', ['read', 'write']);

      const events = await gateway.queryAudit({ kind: 'issued' });

      expect(events.ok && events.value).toHaveLength(1);
      if (events.ok) {
        expect(events.value[0]).toMatchObject({
          tokenId: issued.tokenId,
          tenantId: 'tenant-a',
          detail: { scopes: 'read write', expiresAt: new Date(T0 + 24 * HOUR).toISOString() },
        });
        expect(JSON.stringify(events.value)).not.toContain(issued.token);
      }
    });

    it('should reject invalid requests', async () => {
      create();

      expect(await gateway.issue({ tenantId: 'tenant-a', scopes: [] })).toEqual({
        ok: false,
        kind: 'InvalidRequest',
      });
    });
  });

  describe('store failures', () => {
    function brokenStorage(): GatewayStorage {
      const down = () => Promise.reject(new Error('connection lost'));
      return {
        tokens: {
          insert: down,
          findByHash: down,
          findById: down,
          markRevoked: down,
          updateExpiry: down,
        },
        tenants: { find: down, ensure: down, setStatus: down },
        audit: db.storage.audit,
      };
    }

    it('should turn store failures into StoreUnavailable outcomes', async () => {
      create({ zero_trust: { fail_safe_mode: false } }, brokenStorage());

      expect(await gateway.validate(request('ztg_anything'))).toEqual({
        ok: false,
        kind: 'StoreUnavailable',
      });
      expect(await gateway.issue({ tenantId: 'tenant-a', scopes: ['read'] })).toEqual({
        ok: false,
        kind: 'StoreUnavailable',
      });
      expect(await gateway.revoke('00000000-0000-0000-0000-000000000000')).toEqual({
        ok: false,
        kind: 'StoreUnavailable',
      });
      expect(await gateway.extend('00000000-0000-0000-0000-000000000000')).toEqual({
        ok: false,
        kind: 'StoreUnavailable',
      });
    });
  });

  describe('maintenance', () => {
    it('should sweep idle rate-limit windows', async () => {
      create({ zero_trust: { fail_safe_mode: false } });
      const issued = await issue();
      await gateway.validate(request(issued.token));
      expect(gateway.stats().rateLimiter.trackedTokens).toBe(1);

      clock.advance(2 * HOUR);

      expect(gateway.sweep().rateLimits).toBe(1);
      expect(gateway.stats().rateLimiter.trackedTokens).toBe(0);
    });

    it('should drain the audit queue on close', async () => {
      create();
      await issue();

      await gateway.close();

      expect(gateway.stats().audit).toMatchObject({ written: 1, pending: 0 });
    });
  });
});
