import { describe, it, expect, beforeEach } from 'vitest';
import { AuditLogger } from '../src/audit/index.js';
import type { ValidationPath } from '../src/audit/types.js';
import type { FailureKind } from '../src/errors/index.js';
import { ValidationOrchestrator } from '../src/orchestrator/index.js';
import type {
  InvalidResult,
  TokenValidator,
  ValidationMode,
  ValidationRequest,
  ValidationResult,
  ValidResult,
} from '../src/validation/index.js';
import { MemoryAuditRepository, T0, silentLogger, testConfig } from './helpers.js';

type Behaviour = (signal?: AbortSignal) => Promise<ValidationResult>;

class StubValidator implements TokenValidator {
  calls = 0;
  lastSignal?: AbortSignal;
  lastMode?: ValidationMode;

  constructor(
    readonly path: ValidationPath,
    private behaviour: Behaviour
  ) {}

  respond(behaviour: Behaviour): void {
    this.behaviour = behaviour;
  }

  validate(
    _request: ValidationRequest,
    signal?: AbortSignal,
    mode?: ValidationMode
  ): Promise<ValidationResult> {
    this.calls++;
    this.lastSignal = signal;
    this.lastMode = mode;
    return this.behaviour(signal);
  }
}

function valid(path: ValidationPath): ValidResult {
  return {
    valid: true,
    path,
    tokenId: 'token-1',
    tenant: { tenantId: 'tenant-a', isolationBoundary: 'tenant:tenant-a', status: 'active' },
    grantedScopes: ['read'],
    rateLimitRemaining: 999,
    riskScore: 0,
    stepUpRecommended: false,
    expiresAt: new Date(T0),
    extended: false,
    cacheHit: false,
    durationMs: 1,
  };
}

function invalid(path: ValidationPath, failure: FailureKind): InvalidResult {
  return { valid: false, path, failure, riskScore: 0, cacheHit: false, durationMs: 1 };
}

const never: Behaviour = () => new Promise<ValidationResult>(() => {});

const request: ValidationRequest = {
  token: 'ztg_abc',
  requiredScope: 'read',
  tenantId: 'tenant-a',
  endpoint: '/orders',
};

describe('ValidationOrchestrator', () => {
  let repo: MemoryAuditRepository;
  let legacy: StubValidator;
  let enhanced: StubValidator;

  function create(zeroTrust: Record<string, unknown> = {}) {
    const config = testConfig({
      zero_trust: { middleware_budget_ms: 20, timeout_ms: 50, ...zeroTrust },
    });
    const audit = new AuditLogger(repo, config.audit, silentLogger);
    const orchestrator = new ValidationOrchestrator(
      legacy,
      enhanced,
      audit,
      config.zero_trust,
      silentLogger
    );
    return { orchestrator, audit };
  }

  beforeEach(() => {
    repo = new MemoryAuditRepository();
    legacy = new StubValidator('legacy', async () => valid('legacy'));
    enhanced = new StubValidator('enhanced', async () => valid('enhanced'));
  });

  describe('served path', () => {
    it('should serve the legacy result in fail-safe mode', async () => {
      enhanced.respond(async () => invalid('enhanced', 'InvalidToken'));
      const { orchestrator } = create({ fail_safe_mode: true });

      const result = await orchestrator.validate(request);

      expect(result).toMatchObject({ valid: true, path: 'legacy' });
      expect(orchestrator.servedPath).toBe('legacy');
    });

    it('should serve the enhanced result once fail-safe mode is off', async () => {
      legacy.respond(async () => invalid('legacy', 'InvalidToken'));
      const { orchestrator } = create({ fail_safe_mode: false });

      const result = await orchestrator.validate(request);

      expect(result).toMatchObject({ valid: true, path: 'enhanced' });
    });

    it('should run the other path in shadow mode', async () => {
      const { orchestrator } = create({ fail_safe_mode: false });

      await orchestrator.validate(request);
      await orchestrator.settled();

      expect(enhanced.lastMode).toBe('served');
      expect(legacy.lastMode).toBe('shadow');
    });

    it('should fail closed with ValidationTimeout when the served path is too slow', async () => {
      legacy.respond(never);
      const { orchestrator, audit } = create();

      const result = await orchestrator.validate(request);

      expect(result).toMatchObject({ valid: false, path: 'legacy', failure: 'ValidationTimeout' });
      expect(legacy.lastSignal?.aborted).toBe(true);

      await orchestrator.settled();
      await audit.flush();
      expect(orchestrator.stats().timeouts).toEqual({ legacy: 1, enhanced: 0 });
      expect(orchestrator.stats().comparisons).toBe(0);
      expect(repo.events).toHaveLength(1);
      expect(repo.events[0]).toMatchObject({
        kind: 'timeout',
        severity: 'elevated',
        path: 'legacy',
        outcome: 'ValidationTimeout',
        detail: { timeoutMs: 20 },
      });
    });

    it('should fail closed with StoreUnavailable when the served path throws', async () => {
      legacy.respond(() => Promise.reject(new Error('boom')));
      const { orchestrator } = create();

      const result = await orchestrator.validate(request);

      expect(result).toMatchObject({ valid: false, failure: 'StoreUnavailable' });
      await orchestrator.settled();
      expect(orchestrator.stats().errors).toBe(1);
    });
  });

  describe('comparison', () => {
    it('should count agreeing results as a comparison only', async () => {
      const { orchestrator, audit } = create();

      await orchestrator.validate(request);
      await orchestrator.settled();
      await audit.flush();

      expect(orchestrator.stats()).toMatchObject({ requests: 1, comparisons: 1, discrepancies: 0 });
      expect(repo.events).toHaveLength(0);
      expect(legacy.calls).toBe(1);
      expect(enhanced.calls).toBe(1);
    });

    it('should count and audit a disagreement as critical', async () => {
      enhanced.respond(async () => invalid('enhanced', 'CrossTenantAttempt'));
      const { orchestrator, audit } = create();

      await orchestrator.validate(request);
      await orchestrator.settled();
      await audit.flush();

      expect(orchestrator.stats().discrepancies).toBe(1);
      expect(repo.events).toHaveLength(1);
      expect(repo.events[0]).toMatchObject({
        kind: 'discrepancy',
        severity: 'critical',
        tokenId: 'token-1',
        tenantId: 'tenant-a',
        endpoint: '/orders',
        detail: { legacy: 'valid', enhanced: 'CrossTenantAttempt', served: 'legacy' },
      });
    });

    it('should not count different failure kinds as a disagreement', async () => {
      legacy.respond(async () => invalid('legacy', 'InvalidToken'));
      enhanced.respond(async () => invalid('enhanced', 'CrossTenantAttempt'));
      const { orchestrator } = create();

      await orchestrator.validate(request);
      await orchestrator.settled();

      expect(orchestrator.stats()).toMatchObject({ comparisons: 1, discrepancies: 0 });
    });

    it('should answer before a slow shadow path and count its timeout', async () => {
      enhanced.respond(never);
      const { orchestrator } = create();

      const result = await orchestrator.validate(request);

      expect(result).toMatchObject({ valid: true, path: 'legacy' });
      expect(enhanced.lastSignal?.aborted).toBe(false);

      await orchestrator.settled();
      expect(enhanced.lastSignal?.aborted).toBe(true);
      expect(orchestrator.stats()).toMatchObject({
        comparisons: 0,
        discrepancies: 0,
        timeouts: { legacy: 0, enhanced: 1 },
      });
    });

    it('should run only the served path when parallel validation is disabled', async () => {
      const { orchestrator } = create({ parallel_validation: { enabled: false } });

      await orchestrator.validate(request);
      await orchestrator.settled();

      expect(legacy.calls).toBe(1);
      expect(enhanced.calls).toBe(0);
      expect(orchestrator.stats()).toMatchObject({ parallel: false, requests: 1, comparisons: 0 });
    });
  });
});
