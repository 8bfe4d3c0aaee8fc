import { and, desc, eq, isNull, type SQL } from 'drizzle-orm';
import { apiTokens, auditEvents, tenants } from '../db/schema.postgres.js';
import type { PostgresDb } from '../db/postgres.js';
import type { AuditEvent, AuditQuery } from '../audit/types.js';
import type {
  AuditRepository,
  GatewayStorage,
  TenantRepository,
  TokenRepository,
} from './index.js';
import type { InsertApiToken, InsertTenant, SelectApiToken, SelectTenant } from '../db/schema.js';
import { clampAuditLimit, fromAuditRow, toAuditRow } from './mapping.js';

class PostgresTokenRepository implements TokenRepository {
  constructor(private readonly db: PostgresDb) {}

  async insert(row: InsertApiToken): Promise<void> {
    await this.db.insert(apiTokens).values(row);
  }

  async findByHash(tokenHash: string): Promise<SelectApiToken | null> {
    const rows = await this.db
      .select()
      .from(apiTokens)
      .where(eq(apiTokens.tokenHash, tokenHash))
      .limit(1);
    return rows[0] ?? null;
  }

  async findById(tokenId: string): Promise<SelectApiToken | null> {
    const rows = await this.db.select().from(apiTokens).where(eq(apiTokens.id, tokenId)).limit(1);
    return rows[0] ?? null;
  }

  async markRevoked(tokenId: string, revokedAt: string): Promise<SelectApiToken | null> {
    const rows = await this.db
      .update(apiTokens)
      .set({ revokedAt })
      .where(and(eq(apiTokens.id, tokenId), isNull(apiTokens.revokedAt)))
      .returning();
    return rows[0] ?? null;
  }

  async updateExpiry(
    tokenId: string,
    expiresAt: string,
    expectedExtensionCount?: number
  ): Promise<SelectApiToken | null> {
    const conditions: SQL[] = [eq(apiTokens.id, tokenId), isNull(apiTokens.revokedAt)];
    if (expectedExtensionCount !== undefined) {
      conditions.push(eq(apiTokens.extensionCount, expectedExtensionCount));
    }

    const rows = await this.db
      .update(apiTokens)
      .set(
        expectedExtensionCount === undefined
          ? { expiresAt }
          : { expiresAt, extensionCount: expectedExtensionCount + 1 }
      )
      .where(and(...conditions))
      .returning();
    return rows[0] ?? null;
  }
}

class PostgresTenantRepository implements TenantRepository {
  constructor(private readonly db: PostgresDb) {}

  async find(tenantId: string): Promise<SelectTenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.tenantId, tenantId)).limit(1);
    return rows[0] ?? null;
  }

  async ensure(tenant: InsertTenant): Promise<void> {
    await this.db.insert(tenants).values(tenant).onConflictDoNothing();
  }

  async setStatus(tenantId: string, status: string): Promise<boolean> {
    const rows = await this.db
      .update(tenants)
      .set({ status })
      .where(eq(tenants.tenantId, tenantId))
      .returning({ tenantId: tenants.tenantId });
    return rows.length > 0;
  }
}

class PostgresAuditRepository implements AuditRepository {
  constructor(private readonly db: PostgresDb) {}

  async append(events: readonly AuditEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.db.insert(auditEvents).values(events.map(toAuditRow));
  }

  async query(query: AuditQuery): Promise<AuditEvent[]> {
    const conditions: SQL[] = [];
    if (query.tenantId) conditions.push(eq(auditEvents.tenantId, query.tenantId));
    if (query.kind) conditions.push(eq(auditEvents.kind, query.kind));
    if (query.severity) conditions.push(eq(auditEvents.severity, query.severity));

    const rows = await this.db
      .select()
      .from(auditEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(auditEvents.id))
      .limit(clampAuditLimit(query.limit));

    return rows.map(fromAuditRow);
  }
}

export function createPostgresStorage(db: PostgresDb): GatewayStorage {
  return {
    tokens: new PostgresTokenRepository(db),
    tenants: new PostgresTenantRepository(db),
    audit: new PostgresAuditRepository(db),
  };
}
