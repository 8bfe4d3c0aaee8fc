import type { Logger } from 'pino';
import type { Config } from './config/index.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { initializeDatabase } from './db/index.js';
import { createStorage, type GatewayStorage } from './storage/index.js';
import { AuditLogger, type AuditEvent, type AuditQuery, type AuditStats } from './audit/index.js';
import { CacheLayer, type CacheLayerStats } from './cache/index.js';
import { RateLimiter } from './ratelimit/index.js';
import { SignalTracker } from './risk/index.js';
import { ExtensionManager } from './extension/index.js';
import { TokenStore } from './tokens/store.js';
import type { IssueRequest, IssuedToken, TenantStatus } from './tokens/types.js';
import {
  EnhancedValidator,
  LegacyValidator,
  type ValidationRequest,
  type ValidResult,
} from './validation/index.js';
import { ValidationOrchestrator, type OrchestratorStats } from './orchestrator/index.js';
import {
  StoreUnavailableError,
  failure,
  success,
  type Outcome,
} from './errors/index.js';

const SWEEP_INTERVAL_MS = 60 * 1000;

export interface GatewayOptions {
  clock?: Clock;
  /** Releases the underlying database; called by close() */
  closeStorage?: () => Promise<void>;
}

export interface GatewayStats {
  cache: CacheLayerStats;
  orchestrator: OrchestratorStats;
  audit: AuditStats & { pending: number };
  rateLimiter: { trackedTokens: number };
  signals: { trackedIps: number; trackedTokens: number };
}

export interface SweepResult {
  cache: { validation: number; tenant: number; permission: number };
  rateLimits: number;
  signals: number;
}

/**
 * Entry point of the gateway: owns every component and exposes the operations the
 * HTTP layer needs. Every operation returns an explicit outcome; store failures never
 * escape as exceptions.
 */
export class TokenGateway {
  readonly store: TokenStore;
  readonly cache: CacheLayer;
  readonly audit: AuditLogger;
  readonly orchestrator: ValidationOrchestrator;
  private readonly rateLimiter: RateLimiter;
  private readonly signals: SignalTracker;
  private readonly extension: ExtensionManager;
  private readonly closeStorage?: () => Promise<void>;
  private sweepTimer: NodeJS.Timeout | null = null;
  private closed = false;

  /**
   * Open the configured database and build a gateway on it.
   */
  static async create(
    config: Config,
    logger: Logger,
    options: GatewayOptions = {}
  ): Promise<TokenGateway> {
    const context = await initializeDatabase(config, logger);
    return new TokenGateway(config, createStorage(context), logger, {
      ...options,
      closeStorage: () => context.close(),
    });
  }

  constructor(
    readonly config: Config,
    storage: GatewayStorage,
    private readonly logger: Logger,
    options: GatewayOptions = {}
  ) {
    const clock = options.clock ?? systemClock;
    this.closeStorage = options.closeStorage;

    this.cache = new CacheLayer(config.cache, logger.child({ component: 'cache' }), clock);
    this.store = new TokenStore(storage, config, logger.child({ component: 'store' }), {
      clock,
      onTokenChanged: (tokenHash) => {
        this.cache.invalidateToken(tokenHash);
      },
      onTenantChanged: (tenantId) => {
        this.cache.invalidateTenant(tenantId);
      },
    });
    this.audit = new AuditLogger(
      storage.audit,
      config.audit,
      logger.child({ component: 'audit' }),
      clock
    );
    this.rateLimiter = new RateLimiter(config.rate_limits, clock);
    this.signals = new SignalTracker({ clock });
    this.extension = new ExtensionManager(
      this.store,
      this.audit,
      config.extension,
      logger.child({ component: 'extension' }),
      clock
    );

    const legacy = new LegacyValidator({
      store: this.store,
      rateLimiter: this.rateLimiter,
      audit: this.audit,
      logger: logger.child({ component: 'legacy' }),
      clock,
    });
    const enhanced = new EnhancedValidator(config, {
      store: this.store,
      cache: this.cache,
      rateLimiter: this.rateLimiter,
      signals: this.signals,
      extension: this.extension,
      audit: this.audit,
      logger: logger.child({ component: 'enhanced' }),
      clock,
    });
    this.orchestrator = new ValidationOrchestrator(
      legacy,
      enhanced,
      this.audit,
      config.zero_trust,
      logger.child({ component: 'orchestrator' })
    );
  }

  start(): void {
    this.audit.start();
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  async validate(request: ValidationRequest): Promise<Outcome<ValidResult>> {
    const result = await this.orchestrator.validate(request);
    return result.valid ? success(result) : failure(result.failure);
  }

  async issue(
    request: IssueRequest
  ): Promise<Outcome<IssuedToken, 'InvalidRequest' | 'StoreUnavailable'>> {
    try {
      const outcome = await this.store.issue(request);
      if (outcome.ok) {
        await this.audit.record({
          kind: 'issued',
          severity: 'info',
          tokenId: outcome.value.tokenId,
          tenantId: request.tenantId,
          outcome: 'issued',
          detail: {
            scopes: [...new Set(request.scopes)].join(' '),
            expiresAt: outcome.value.expiresAt.toISOString(),
          },
        });
      }
      return outcome;
    } catch (err) {
      return this.storeFailure(err);
    }
  }

  async extend(tokenId: string): Promise<Outcome<boolean, 'StoreUnavailable'>> {
    try {
      return success(await this.extension.extend(tokenId));
    } catch (err) {
      return this.storeFailure(err);
    }
  }

  async revoke(tokenId: string): Promise<Outcome<boolean, 'StoreUnavailable'>> {
    try {
      const revoked = await this.store.revoke(tokenId);
      if (revoked) {
        this.signals.forgetToken(tokenId);
        this.rateLimiter.reset(tokenId);
        await this.audit.record({
          kind: 'revoked',
          severity: 'info',
          tokenId,
          outcome: 'revoked',
        });
      }
      return success(revoked);
    } catch (err) {
      return this.storeFailure(err);
    }
  }

  async setTenantStatus(
    tenantId: string,
    status: TenantStatus
  ): Promise<Outcome<boolean, 'StoreUnavailable'>> {
    try {
      return success(await this.store.setTenantStatus(tenantId, status));
    } catch (err) {
      return this.storeFailure(err);
    }
  }

  async queryAudit(query: AuditQuery): Promise<Outcome<AuditEvent[], 'StoreUnavailable'>> {
    try {
      await this.audit.flush();
      return success(await this.audit.query(query));
    } catch (err) {
      this.logger.error({ err }, 'Audit query failed');
      return failure('StoreUnavailable');
    }
  }

  /** Drop expired cache entries, idle rate-limit windows and stale risk signals */
  sweep(): SweepResult {
    const result = {
      cache: this.cache.cleanupExpired(),
      rateLimits: this.rateLimiter.sweep(),
      signals: this.signals.sweep(),
    };
    this.logger.debug(result, 'Periodic sweep complete');
    return result;
  }

  stats(): GatewayStats {
    return {
      cache: this.cache.stats(),
      orchestrator: this.orchestrator.stats(),
      audit: { ...this.audit.stats(), pending: this.audit.pending() },
      rateLimiter: { trackedTokens: this.rateLimiter.size() },
      signals: this.signals.stats(),
    };
  }

  /**
   * Stop timers, wait for background comparisons, drain the audit queue and release
   * the database, in that order.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.orchestrator.settled();
    await this.audit.close();
    await this.closeStorage?.();
    this.logger.info('Gateway closed');
  }

  private storeFailure(err: unknown): { ok: false; kind: 'StoreUnavailable' } {
    if (err instanceof StoreUnavailableError) {
      return failure('StoreUnavailable');
    }
    throw err;
  }
}
