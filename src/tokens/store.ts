import { createHmac, randomBytes, randomUUID } from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { SecurityLevelSchema } from '../config/index.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import type { GatewayStorage, SelectApiToken, SelectTenant } from '../storage/index.js';
import { failure, success, type Outcome } from '../errors/index.js';
import { withRetry } from './retry.js';
import {
  TenantStatusSchema,
  type IssueRequest,
  type IssuedToken,
  type TenantContext,
  type TenantStatus,
  type TokenRecord,
} from './types.js';

const SCOPE_PATTERN = /^[A-Za-z0-9:_.-]+$/;
const TOKEN_BYTES = 32;

const ScopesSchema = z.array(z.string());

export interface TokenStoreOptions {
  clock?: Clock;
  /** Called with the token hash whenever a stored token changes */
  onTokenChanged?: (tokenHash: string) => void;
  /** Called with the tenant id whenever a tenant's status changes */
  onTenantChanged?: (tenantId: string) => void;
}

export function shortHash(tokenHash: string): string {
  return tokenHash.substring(0, 8);
}

function toRecord(row: SelectApiToken): TokenRecord {
  return Object.freeze({
    tokenId: row.id,
    tokenHash: row.tokenHash,
    tenantId: row.tenantId,
    scopes: Object.freeze(ScopesSchema.parse(JSON.parse(row.scopes))),
    securityLevel: SecurityLevelSchema.parse(row.securityLevel),
    issuedAt: new Date(row.issuedAt),
    expiresAt: new Date(row.expiresAt),
    extensionCount: row.extensionCount,
    revokedAt: row.revokedAt === null ? undefined : new Date(row.revokedAt),
  });
}

function toTenant(row: SelectTenant): TenantContext {
  return Object.freeze({
    tenantId: row.tenantId,
    isolationBoundary: row.isolationBoundary,
    status: TenantStatusSchema.parse(row.status),
  });
}

/**
 * Durable token metadata keyed by a keyed hash of the token value.
 * Store failures surface as StoreUnavailableError after bounded retry.
 */
export class TokenStore {
  private readonly clock: Clock;
  private readonly onTokenChanged?: (tokenHash: string) => void;
  private readonly onTenantChanged?: (tenantId: string) => void;

  constructor(
    private readonly storage: GatewayStorage,
    private readonly config: Config,
    private readonly logger: Logger,
    options: TokenStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.onTokenChanged = options.onTokenChanged;
    this.onTenantChanged = options.onTenantChanged;
  }

  hashToken(raw: string): string {
    return createHmac('sha256', this.config.tokens.hash_secret).update(raw).digest('hex');
  }

  /** Cheap structural check done before any hashing or store access */
  isWellFormed(raw: string): boolean {
    const { prefix } = this.config.tokens;
    return raw.length > prefix.length && raw.length <= 512 && raw.startsWith(prefix);
  }

  async issue(request: IssueRequest): Promise<Outcome<IssuedToken, 'InvalidRequest'>> {
    const scopes = [...new Set(request.scopes)];
    const ttlSeconds = request.ttlSeconds ?? this.config.tokens.default_ttl_seconds;

    if (
      request.tenantId.length === 0 ||
      scopes.length === 0 ||
      !scopes.every((scope) => SCOPE_PATTERN.test(scope)) ||
      !Number.isInteger(ttlSeconds) ||
      ttlSeconds <= 0 ||
      ttlSeconds > this.config.tokens.max_ttl_seconds
    ) {
      return failure('InvalidRequest');
    }

    const token = this.config.tokens.prefix + randomBytes(TOKEN_BYTES).toString('base64url');
    const tokenHash = this.hashToken(token);
    const tokenId = randomUUID();
    const now = this.clock();
    const issuedAt = new Date(now);
    const expiresAt = new Date(now + ttlSeconds * 1000);

    await withRetry(
      'issue',
      async () => {
        await this.storage.tenants.ensure({
          tenantId: request.tenantId,
          isolationBoundary: `tenant:${request.tenantId}`,
          status: 'active',
          createdAt: issuedAt.toISOString(),
        });
        await this.storage.tokens.insert({
          id: tokenId,
          tokenHash,
          tenantId: request.tenantId,
          scopes: JSON.stringify(scopes),
          securityLevel: request.securityLevel ?? 'STANDARD',
          issuedAt: issuedAt.toISOString(),
          expiresAt: expiresAt.toISOString(),
          extensionCount: 0,
        });
      },
      this.config.storage.retry,
      this.logger
    );

    this.logger.info(
      { tokenId, tenantId: request.tenantId, tokenHash: shortHash(tokenHash), ttlSeconds },
      'Token issued'
    );
    return success({ token, tokenId, expiresAt });
  }

  async lookup(tokenHash: string): Promise<TokenRecord | null> {
    return withRetry(
      'lookup',
      async () => {
        const row = await this.storage.tokens.findByHash(tokenHash);
        return row ? toRecord(row) : null;
      },
      this.config.storage.retry,
      this.logger
    );
  }

  async findById(tokenId: string): Promise<TokenRecord | null> {
    return withRetry(
      'findById',
      async () => {
        const row = await this.storage.tokens.findById(tokenId);
        return row ? toRecord(row) : null;
      },
      this.config.storage.retry,
      this.logger
    );
  }

  /**
   * Revoke a token. Returns false when it is unknown or already revoked.
   */
  async revoke(tokenId: string): Promise<boolean> {
    const revokedAt = new Date(this.clock()).toISOString();
    const row = await withRetry(
      'revoke',
      () => this.storage.tokens.markRevoked(tokenId, revokedAt),
      this.config.storage.retry,
      this.logger
    );
    if (!row) {
      return false;
    }
    this.onTokenChanged?.(row.tokenHash);
    this.logger.info({ tokenId, tenantId: row.tenantId }, 'Token revoked');
    return true;
  }

  /**
   * Move a token's expiry. With `expectedExtensionCount` this is a compare-and-set on the
   * extension count, which is incremented; null means the token is gone, revoked, or was
   * extended concurrently.
   */
  async updateExpiry(
    tokenId: string,
    newExpiry: Date,
    expectedExtensionCount?: number
  ): Promise<TokenRecord | null> {
    const record = await withRetry(
      'updateExpiry',
      async () => {
        const row = await this.storage.tokens.updateExpiry(
          tokenId,
          newExpiry.toISOString(),
          expectedExtensionCount
        );
        return row ? toRecord(row) : null;
      },
      this.config.storage.retry,
      this.logger
    );
    if (record) {
      this.onTokenChanged?.(record.tokenHash);
    }
    return record;
  }

  async findTenant(tenantId: string): Promise<TenantContext | null> {
    return withRetry(
      'findTenant',
      async () => {
        const row = await this.storage.tenants.find(tenantId);
        return row ? toTenant(row) : null;
      },
      this.config.storage.retry,
      this.logger
    );
  }

  async setTenantStatus(tenantId: string, status: TenantStatus): Promise<boolean> {
    const updated = await withRetry(
      'setTenantStatus',
      () => this.storage.tenants.setStatus(tenantId, status),
      this.config.storage.retry,
      this.logger
    );
    if (updated) {
      this.onTenantChanged?.(tenantId);
      this.logger.info({ tenantId, status }, 'Tenant status changed');
    }
    return updated;
  }
}
