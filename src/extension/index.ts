import type { Logger } from 'pino';
import type { ExtensionConfig } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { AuditLogger } from '../audit/index.js';
import type { ValidationPath } from '../audit/types.js';
import type { TokenStore } from '../tokens/store.js';
import type { TokenRecord } from '../tokens/types.js';

export type ExtensionReason = 'sliding' | 'grace' | 'explicit';

export interface ExtensionContext {
  path?: ValidationPath;
  endpoint?: string;
}

/**
 * Sliding expiry. A token close to its expiry is pushed forward by a fixed increment,
 * at most `max_count` times. The store update is a compare-and-set on the extension
 * count, so two concurrent renewals of one token extend it once.
 */
export class ExtensionManager {
  constructor(
    private readonly store: TokenStore,
    private readonly audit: AuditLogger,
    private readonly config: ExtensionConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  shouldExtend(record: TokenRecord, now: number = this.clock()): boolean {
    const remainingMs = record.expiresAt.getTime() - now;
    return (
      this.config.enabled &&
      record.revokedAt === undefined &&
      remainingMs > 0 &&
      remainingMs < this.config.threshold_seconds * 1000 &&
      record.extensionCount < this.config.max_count
    );
  }

  /** Expired, but recently enough to be renewed instead of rejected */
  isWithinGrace(record: TokenRecord, now: number = this.clock()): boolean {
    const expiredForMs = now - record.expiresAt.getTime();
    return (
      this.config.enabled &&
      record.revokedAt === undefined &&
      expiredForMs >= 0 &&
      expiredForMs < this.config.grace_seconds * 1000 &&
      record.extensionCount < this.config.max_count
    );
  }

  /** Renew when eligible; null when not eligible or a concurrent renewal won */
  async maybeExtend(record: TokenRecord, context: ExtensionContext = {}): Promise<TokenRecord | null> {
    if (!this.shouldExtend(record)) {
      return null;
    }
    return this.apply(record, 'sliding', context);
  }

  async renewExpired(record: TokenRecord, context: ExtensionContext = {}): Promise<TokenRecord | null> {
    if (!this.isWithinGrace(record)) {
      return null;
    }
    return this.apply(record, 'grace', context);
  }

  /**
   * Explicit renewal, regardless of how much lifetime is left.
   */
  async extend(tokenId: string): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }
    const record = await this.store.findById(tokenId);
    if (!record || record.revokedAt !== undefined || record.extensionCount >= this.config.max_count) {
      return false;
    }
    const now = this.clock();
    if (record.expiresAt.getTime() <= now && !this.isWithinGrace(record, now)) {
      return false;
    }
    return (await this.apply(record, 'explicit', {})) !== null;
  }

  private async apply(
    record: TokenRecord,
    reason: ExtensionReason,
    context: ExtensionContext
  ): Promise<TokenRecord | null> {
    const newExpiry = new Date(record.expiresAt.getTime() + this.config.increment_seconds * 1000);
    const updated = await this.store.updateExpiry(record.tokenId, newExpiry, record.extensionCount);

    if (!updated) {
      this.logger.debug({ tokenId: record.tokenId, reason }, 'Token extension lost to a concurrent update');
      return null;
    }

    this.logger.info(
      {
        tokenId: updated.tokenId,
        expiresAt: updated.expiresAt.toISOString(),
        extensionCount: updated.extensionCount,
        reason,
      },
      'Token extended'
    );
    await this.audit.record({
      kind: 'extended',
      severity: 'info',
      path: context.path,
      tokenId: updated.tokenId,
      tenantId: updated.tenantId,
      endpoint: context.endpoint,
      outcome: 'extended',
      detail: {
        reason,
        extensionCount: updated.extensionCount,
        expiresAt: updated.expiresAt.toISOString(),
      },
    });
    return updated;
  }
}
