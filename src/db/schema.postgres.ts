import { pgTable, text, integer, serial, index } from 'drizzle-orm/pg-core';

export const tenants = pgTable('tenants', {
  tenantId: text('tenant_id').primaryKey(),
  isolationBoundary: text('isolation_boundary').notNull(),
  status: text('status').notNull().default('active'),
  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export const apiTokens = pgTable(
  'api_tokens',
  {
    id: text('id').primaryKey(),
    tokenHash: text('token_hash').notNull().unique(),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.tenantId),
    scopes: text('scopes').notNull(), // JSON array
    securityLevel: text('security_level').notNull(),
    issuedAt: text('issued_at').notNull(),
    expiresAt: text('expires_at').notNull(),
    extensionCount: integer('extension_count').notNull().default(0),
    revokedAt: text('revoked_at'),
  },
  (table) => ({
    tenantIdx: index('idx_tokens_tenant').on(table.tenantId),
    expiresAtIdx: index('idx_tokens_expires_at').on(table.expiresAt),
  })
);

export const auditEvents = pgTable(
  'audit_events',
  {
    id: serial('id').primaryKey(),
    eventTime: text('event_time').notNull(),
    kind: text('kind').notNull(),
    severity: text('severity').notNull(),
    path: text('path'),
    tokenId: text('token_id'),
    tenantId: text('tenant_id'),
    endpoint: text('endpoint'),
    outcome: text('outcome').notNull(),
    latencyMs: integer('latency_ms'),
    detail: text('detail'),
  },
  (table) => ({
    eventTimeIdx: index('idx_audit_event_time').on(table.eventTime),
    severityIdx: index('idx_audit_severity').on(table.severity),
    tenantIdx: index('idx_audit_tenant').on(table.tenantId),
  })
);
