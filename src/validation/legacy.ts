import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { AuditLogger } from '../audit/index.js';
import type { RateLimiter } from '../ratelimit/index.js';
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
} from './types.js';

export interface LegacyValidatorDeps {
  store: TokenStore;
  rateLimiter: RateLimiter;
  audit: AuditLogger;
  logger: Logger;
  clock?: Clock;
}

/**
 * The decision path that is in production today: direct store lookup, no cache, no
 * renewal and no tenant status check. It reads the rate limit window without
 * consuming from it.
 */
export class LegacyValidator implements TokenValidator {
  readonly path = 'legacy' as const;
  private readonly store: TokenStore;
  private readonly rateLimiter: RateLimiter;
  private readonly audit: AuditLogger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: LegacyValidatorDeps) {
    this.store = deps.store;
    this.rateLimiter = deps.rateLimiter;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  async validate(
    request: ValidationRequest,
    signal?: AbortSignal,
    mode: ValidationMode = 'served'
  ): Promise<ValidationResult> {
    const started = performance.now();

    const finish = async (failure: FailureKind, record?: TokenRecord): Promise<InvalidResult> => {
      const result: InvalidResult = {
        valid: false,
        path: this.path,
        failure,
        tokenId: record?.tokenId,
        riskScore: 0,
        cacheHit: false,
        durationMs: performance.now() - started,
      };
      if (signal?.aborted) {
        return result;
      }

      const severity = failureSeverity(failure, mode);
      if (severity === 'critical') {
        this.logger.warn(
          {
            tokenId: record?.tokenId,
            tokenHash: record ? shortHash(record.tokenHash) : undefined,
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
        detail:
          failure === 'CrossTenantAttempt'
            ? { scope: request.requiredScope, requestedTenant: request.tenantId }
            : undefined,
      });
      return result;
    };

    try {
      if (!request.token) {
        return await finish('InvalidToken');
      }

      const record = await this.store.lookup(this.store.hashToken(request.token));
      if (signal?.aborted) return await finish('ValidationTimeout');
      if (!record || record.revokedAt !== undefined) {
        return await finish('InvalidToken');
      }
      if (record.tenantId !== request.tenantId) {
        return await finish('CrossTenantAttempt', record);
      }
      if (record.expiresAt.getTime() <= this.clock()) {
        return await finish('ExpiredToken', record);
      }
      if (!record.scopes.includes(request.requiredScope)) {
        return await finish('InsufficientScope', record);
      }

      const tenant = await this.store.findTenant(record.tenantId);
      if (signal?.aborted) return await finish('ValidationTimeout');
      if (!tenant) {
        return await finish('InvalidToken');
      }

      const limit = this.rateLimiter.limitFor(record.securityLevel);
      const used = this.rateLimiter.count(record.tokenId);
      const durationMs = performance.now() - started;
      await this.audit.record({
        kind: 'decision',
        severity: 'info',
        path: this.path,
        tokenId: record.tokenId,
        tenantId: record.tenantId,
        endpoint: request.endpoint,
        outcome: 'valid',
        latencyMs: Math.round(durationMs),
      });
      return {
        valid: true,
        path: this.path,
        tokenId: record.tokenId,
        tenant,
        grantedScopes: record.scopes,
        rateLimitRemaining: Math.max(0, limit - used),
        riskScore: 0,
        stepUpRecommended: false,
        expiresAt: record.expiresAt,
        extended: false,
        cacheHit: false,
        durationMs,
      };
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.logger.warn(
          { operation: err.operation },
          'Legacy validation failed: token store unavailable'
        );
        return finish('StoreUnavailable');
      }
      throw err;
    }
  }
}
