import type { DatabaseContext } from '../db/index.js';
import type { AuditEvent, AuditQuery } from '../audit/types.js';
// Import schema types - use SQLite schema types as canonical (they're compatible)
import type {
  InsertApiToken,
  InsertTenant,
  SelectApiToken,
  SelectTenant,
} from '../db/schema.js';
import { createSQLiteStorage } from './sqlite.js';
import { createPostgresStorage } from './postgres.js';

export { clampAuditLimit, MAX_AUDIT_QUERY_LIMIT } from './mapping.js';

export type { InsertApiToken, InsertTenant, SelectApiToken, SelectTenant };

export interface TokenRepository {
  insert(row: InsertApiToken): Promise<void>;
  findByHash(tokenHash: string): Promise<SelectApiToken | null>;
  findById(tokenId: string): Promise<SelectApiToken | null>;
  /** Sets revoked_at on a token that is not revoked yet; returns the updated row */
  markRevoked(tokenId: string, revokedAt: string): Promise<SelectApiToken | null>;
  /**
   * Moves expires_at on a non-revoked token. With `expectedExtensionCount` the update only
   * applies while extension_count still equals it, and increments the count.
   */
  updateExpiry(
    tokenId: string,
    expiresAt: string,
    expectedExtensionCount?: number
  ): Promise<SelectApiToken | null>;
}

export interface TenantRepository {
  find(tenantId: string): Promise<SelectTenant | null>;
  /** Insert the tenant unless it already exists */
  ensure(tenant: InsertTenant): Promise<void>;
  setStatus(tenantId: string, status: string): Promise<boolean>;
}

export interface AuditRepository {
  append(events: readonly AuditEvent[]): Promise<void>;
  query(query: AuditQuery): Promise<AuditEvent[]>;
}

export interface GatewayStorage {
  tokens: TokenRepository;
  tenants: TenantRepository;
  audit: AuditRepository;
}

export function createStorage(context: DatabaseContext): GatewayStorage {
  return context.type === 'postgres'
    ? createPostgresStorage(context.db)
    : createSQLiteStorage(context.db);
}
