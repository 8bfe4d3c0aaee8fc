import { and, desc, eq, isNull, type SQL } from 'drizzle-orm';
import { apiTokens, auditEvents, tenants } from '../db/schema.js';
import type { SQLiteDb } from '../db/adapter.js';
import type { AuditEvent, AuditQuery } from '../audit/types.js';
import type {
  AuditRepository,
  GatewayStorage,
  TenantRepository,
  TokenRepository,
} from './index.js';
import type { InsertApiToken, InsertTenant, SelectApiToken, SelectTenant } from '../db/schema.js';
import { clampAuditLimit, fromAuditRow, toAuditRow } from './mapping.js';

class SQLiteTokenRepository implements TokenRepository {
  constructor(private readonly db: SQLiteDb) {}

  async insert(row: InsertApiToken): Promise<void> {
    this.db.insert(apiTokens).values(row).run();
  }

  async findByHash(tokenHash: string): Promise<SelectApiToken | null> {
    return this.db.select().from(apiTokens).where(eq(apiTokens.tokenHash, tokenHash)).get() ?? null;
  }

  async findById(tokenId: string): Promise<SelectApiToken | null> {
    return this.db.select().from(apiTokens).where(eq(apiTokens.id, tokenId)).get() ?? null;
  }

  async markRevoked(tokenId: string, revokedAt: string): Promise<SelectApiToken | null> {
    return (
      this.db
        .update(apiTokens)
        .set({ revokedAt })
        .where(and(eq(apiTokens.id, tokenId), isNull(apiTokens.revokedAt)))
        .returning()
        .get() ?? null
    );
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

    return (
      this.db
        .update(apiTokens)
        .set(
          expectedExtensionCount === undefined
            ? { expiresAt }
            : { expiresAt, extensionCount: expectedExtensionCount + 1 }
        )
        .where(and(...conditions))
        .returning()
        .get() ?? null
    );
  }
}

class SQLiteTenantRepository implements TenantRepository {
  constructor(private readonly db: SQLiteDb) {}

  async find(tenantId: string): Promise<SelectTenant | null> {
    return this.db.select().from(tenants).where(eq(tenants.tenantId, tenantId)).get() ?? null;
  }

  async ensure(tenant: InsertTenant): Promise<void> {
    this.db.insert(tenants).values(tenant).onConflictDoNothing().run();
  }

  async setStatus(tenantId: string, status: string): Promise<boolean> {
    const result = this.db
      .update(tenants)
      .set({ status })
      .where(eq(tenants.tenantId, tenantId))
      .run();
    return result.changes > 0;
  }
}

class SQLiteAuditRepository implements AuditRepository {
  constructor(private readonly db: SQLiteDb) {}

  async append(events: readonly AuditEvent[]): Promise<void> {
    if (events.length === 0) return;
    this.db.insert(auditEvents).values(events.map(toAuditRow)).run();
  }

  async query(query: AuditQuery): Promise<AuditEvent[]> {
    const conditions: SQL[] = [];
    if (query.tenantId) conditions.push(eq(auditEvents.tenantId, query.tenantId));
    if (query.kind) conditions.push(eq(auditEvents.kind, query.kind));
    if (query.severity) conditions.push(eq(auditEvents.severity, query.severity));

    const rows = this.db
      .select()
      .from(auditEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(auditEvents.id))
      .limit(clampAuditLimit(query.limit))
      .all();

    return rows.map(fromAuditRow);
  }
}

export function createSQLiteStorage(db: SQLiteDb): GatewayStorage {
  return {
    tokens: new SQLiteTokenRepository(db),
    tenants: new SQLiteTenantRepository(db),
    audit: new SQLiteAuditRepository(db),
  };
}
