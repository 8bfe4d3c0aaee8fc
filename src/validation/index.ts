import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { AuditLogger } from '../audit/index.js';
import type { CacheLayer } from '../cache/index.js';
import type { ExtensionManager } from '../extension/index.js';
import type { RateLimiter } from '../ratelimit/index.js';
import { scoreRisk, type SignalTracker } from '../risk/index.js';
import { StoreUnavailableError, type FailureKind } from '../errors/index.js';
import { shortHash, type TokenStore } from '../tokens/store.js';
import type { TokenRecord } from '../tokens/types.js';
import { failureSeverity } from './types.js';
import type {
  InvalidResult,
  TokenValidator,
  ValidationMode,
  ValidationRequest,
  ValidationResult,
  ValidResult,
} from './types.js';

export type {
  InvalidResult,
  TokenValidator,
  ValidationMode,
  ValidationRequest,
  ValidationResult,
  ValidResult,
} from './types.js';
export { LegacyValidator } from './legacy.js';

export interface EnhancedValidatorDeps {
  store: TokenStore;
  cache: CacheLayer;
  rateLimiter: RateLimiter;
  signals: SignalTracker;
  extension: ExtensionManager;
  audit: AuditLogger;
  logger: Logger;
  clock?: Clock;
}

interface Attempt {
  request: ValidationRequest;
  mode: ValidationMode;
  started: number;
  signal?: AbortSignal;
  tokenHash?: string;
  record?: TokenRecord;
  cacheHit: boolean;
  riskScore: number;
}

// Failures that count against the client IP in later risk scores
const SUSPICIOUS_FAILURES: ReadonlySet<FailureKind> = new Set([
  'InvalidToken',
  'ExpiredToken',
  'CrossTenantAttempt',
  'InsufficientScope',
]);

/**
 * Zero-trust decision path. Checks run in a fixed order and the first failing one
 * decides: existence, tenant binding, expiry, scope, tenant status, rate limit. The
 * risk score only annotates a valid result.
 *
 * Once the abort signal fires the validator stops producing side effects: no rate
 * limit slot is consumed and nothing is cached, extended or audited.
 */
export class EnhancedValidator implements TokenValidator {
  readonly path = 'enhanced' as const;
  private readonly store: TokenStore;
  private readonly cache: CacheLayer;
  private readonly rateLimiter: RateLimiter;
  private readonly signals: SignalTracker;
  private readonly extension: ExtensionManager;
  private readonly audit: AuditLogger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly config: Config,
    deps: EnhancedValidatorDeps
  ) {
    this.store = deps.store;
    this.cache = deps.cache;
    this.rateLimiter = deps.rateLimiter;
    this.signals = deps.signals;
    this.extension = deps.extension;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  async validate(
    request: ValidationRequest,
    signal?: AbortSignal,
    mode: ValidationMode = 'served'
  ): Promise<ValidationResult> {
    const attempt: Attempt = {
      request,
      mode,
      signal,
      started: performance.now(),
      cacheHit: false,
      riskScore: 0,
    };
    try {
      return await this.run(attempt);
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.logger.warn(
          { operation: err.operation },
          'Enhanced validation failed: token store unavailable'
        );
        return this.fail(attempt, 'StoreUnavailable');
      }
      throw err;
    }
  }

  private async run(attempt: Attempt): Promise<ValidationResult> {
    const { request, signal } = attempt;

    // 1. Structure
    if (!this.store.isWellFormed(request.token)) {
      return this.fail(attempt, 'InvalidToken');
    }

    // 2. Existence: validation cache, then store
    const tokenHash = this.store.hashToken(request.token);
    attempt.tokenHash = tokenHash;
    const tokenGeneration = this.cache.tokenGeneration();
    let record = this.cache.getToken(tokenHash, request.requiredScope);
    attempt.cacheHit = record !== undefined;
    if (!record) {
      record = (await this.store.lookup(tokenHash)) ?? undefined;
      if (signal?.aborted) return this.abandon(attempt);
    }
    if (!record || record.revokedAt !== undefined) {
      return this.fail(attempt, 'InvalidToken');
    }
    attempt.record = record;

    // 3. Expiry verdict, held until the tenant binding is known
    const expired = record.expiresAt.getTime() <= this.clock();

    // 4. Tenant binding dominates expiry
    if (record.tenantId !== request.tenantId) {
      return this.fail(attempt, 'CrossTenantAttempt');
    }

    let extended = false;
    if (expired) {
      if (signal?.aborted) return this.abandon(attempt);
      const renewed = await this.extension.renewExpired(record, {
        path: this.path,
        endpoint: request.endpoint,
      });
      if (signal?.aborted) return this.abandon(attempt);
      if (!renewed) {
        return this.fail(attempt, 'ExpiredToken');
      }
      record = renewed;
      attempt.record = renewed;
      extended = true;
    }

    // 5. Scope
    const granted =
      this.cache.getPermissions(tokenHash, record.scopes) ??
      this.cache.setPermissions(tokenHash, record.scopes);
    if (!granted.has(request.requiredScope)) {
      return this.fail(attempt, 'InsufficientScope');
    }

    // 6. Tenant status
    let tenant = this.cache.getTenant(record.tenantId);
    if (!tenant) {
      const tenantGeneration = this.cache.tenantGeneration();
      tenant = (await this.store.findTenant(record.tenantId)) ?? undefined;
      if (signal?.aborted) return this.abandon(attempt);
      if (tenant) {
        this.cache.setTenant(tenant, tenantGeneration);
      }
    }
    if (!tenant || tenant.status !== 'active') {
      return this.fail(attempt, 'InvalidToken');
    }

    // 7. Rate limit
    if (signal?.aborted) return this.abandon(attempt);
    const limit = this.rateLimiter.consume(record.tokenId, record.securityLevel);
    if (!limit.allowed) {
      return this.fail(attempt, 'RateLimitExceeded');
    }

    // 8. Risk
    const clientIp = request.clientIp;
    attempt.riskScore = scoreRisk(
      {
        clientIp,
        userAgent: request.userAgent,
        endpoint: request.endpoint,
        requestCount: limit.limit - limit.remaining,
        rateLimit: limit.limit,
        recentFailures: clientIp ? this.signals.recentFailures(clientIp) : 0,
        knownIp: clientIp ? this.signals.isKnownIp(record.tokenId, clientIp) : true,
      },
      this.config.risk
    );
    if (clientIp) {
      this.signals.rememberIp(record.tokenId, clientIp);
    }
    const stepUpRecommended = attempt.riskScore >= this.config.risk.elevated_threshold;

    // 9. Sliding renewal, cache, audit
    if (signal?.aborted) return this.abandon(attempt);
    if (!extended) {
      const renewed = await this.extension.maybeExtend(record, {
        path: this.path,
        endpoint: request.endpoint,
      });
      if (signal?.aborted) return this.abandon(attempt);
      if (renewed) {
        record = renewed;
        extended = true;
      }
    }
    // Skipped when the token changed since the lookup, including by this renewal
    this.cache.setToken(tokenHash, request.requiredScope, record, tokenGeneration);

    const result: ValidResult = {
      valid: true,
      path: this.path,
      tokenId: record.tokenId,
      tenant,
      grantedScopes: record.scopes,
      rateLimitRemaining: limit.remaining,
      riskScore: attempt.riskScore,
      stepUpRecommended,
      expiresAt: record.expiresAt,
      extended,
      cacheHit: attempt.cacheHit,
      durationMs: performance.now() - attempt.started,
    };

    await this.audit.record({
      kind: 'decision',
      severity: stepUpRecommended ? 'elevated' : 'info',
      path: this.path,
      tokenId: record.tokenId,
      tenantId: record.tenantId,
      endpoint: request.endpoint,
      outcome: 'valid',
      latencyMs: Math.round(result.durationMs),
      detail: {
        scope: request.requiredScope,
        riskScore: attempt.riskScore,
        cacheHit: attempt.cacheHit,
        extended,
      },
    });
    return result;
  }

  private async fail(attempt: Attempt, failure: FailureKind): Promise<InvalidResult> {
    const result = this.invalid(attempt, failure);
    if (attempt.signal?.aborted) {
      return result;
    }

    const { request, record } = attempt;
    if (request.clientIp && SUSPICIOUS_FAILURES.has(failure)) {
      this.signals.recordFailure(request.clientIp);
    }

    const crossTenant = failure === 'CrossTenantAttempt';
    const severity = failureSeverity(failure, attempt.mode);
    if (severity === 'critical') {
      this.logger.warn(
        {
          tokenId: record?.tokenId,
          tokenHash: attempt.tokenHash ? shortHash(attempt.tokenHash) : undefined,
          boundTenant: record?.tenantId,
          requestedTenant: request.tenantId,
        },
        'Cross-tenant token use blocked'
      );
    }

    await this.audit.record({
      kind: 'decision',
      severity,
      path: this.path,
      tokenId: record?.tokenId,
      tenantId: record?.tenantId,
      endpoint: request.endpoint,
      outcome: failure,
      latencyMs: Math.round(result.durationMs),
      detail: crossTenant
        ? { scope: request.requiredScope, requestedTenant: request.tenantId }
        : { scope: request.requiredScope },
    });
    return result;
  }

  private abandon(attempt: Attempt): InvalidResult {
    this.logger.debug({ tokenId: attempt.record?.tokenId }, 'Enhanced validation aborted');
    return this.invalid(attempt, 'ValidationTimeout');
  }

  private invalid(attempt: Attempt, failure: FailureKind): InvalidResult {
    return {
      valid: false,
      path: this.path,
      failure,
      tokenId: attempt.record?.tokenId,
      riskScore: attempt.riskScore,
      cacheHit: attempt.cacheHit,
      durationMs: performance.now() - attempt.started,
    };
  }
}
