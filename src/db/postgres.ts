/**
 * PostgreSQL database initialization and migrations.
 *
 * This module handles:
 * - Dynamic import of 'pg'
 * - Connection pool setup
 * - Auto-creation of tables if user has CREATE permissions
 */

import { drizzle } from 'drizzle-orm/node-postgres';
import type { PostgresConfig } from '../config/index.js';
import * as schema from './schema.postgres.js';
import type { Logger } from 'pino';

// Re-export PostgreSQL schema
export { schema };

export type PostgresDb = ReturnType<typeof drizzle<typeof schema>>;

/**
 * PostgreSQL error codes
 * @see https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
const PG_ERROR_CODES = {
  INSUFFICIENT_PRIVILEGE: '42501',
};

function isPermissionError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === PG_ERROR_CODES.INSUFFICIENT_PRIVILEGE
  );
}

/**
 * SQL DDL for creating PostgreSQL tables.
 * Uses CREATE TABLE IF NOT EXISTS for idempotent setup.
 */
const POSTGRES_MIGRATIONS = `
  CREATE TABLE IF NOT EXISTS tenants (
    tenant_id TEXT PRIMARY KEY,
    isolation_boundary TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'active',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS api_tokens (
    id TEXT PRIMARY KEY,
    token_hash TEXT NOT NULL UNIQUE,
    tenant_id TEXT NOT NULL REFERENCES tenants(tenant_id),
    scopes TEXT NOT NULL,
    security_level TEXT NOT NULL,
    issued_at TEXT NOT NULL,
    expires_at TEXT NOT NULL,
    extension_count INTEGER NOT NULL DEFAULT 0,
    revoked_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_tokens_tenant ON api_tokens(tenant_id);
  CREATE INDEX IF NOT EXISTS idx_tokens_expires_at ON api_tokens(expires_at);

  -- Append-only audit trail
  CREATE TABLE IF NOT EXISTS audit_events (
    id SERIAL PRIMARY KEY,
    event_time TEXT NOT NULL,
    kind TEXT NOT NULL,
    severity TEXT NOT NULL,
    path TEXT,
    token_id TEXT,
    tenant_id TEXT,
    endpoint TEXT,
    outcome TEXT NOT NULL,
    latency_ms INTEGER,
    detail TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_audit_event_time ON audit_events(event_time);
  CREATE INDEX IF NOT EXISTS idx_audit_severity ON audit_events(severity);
  CREATE INDEX IF NOT EXISTS idx_audit_tenant ON audit_events(tenant_id);

  CREATE OR REPLACE FUNCTION audit_events_append_only() RETURNS trigger AS $$
  BEGIN
    RAISE EXCEPTION 'audit_events is append-only';
  END;
  $$ LANGUAGE plpgsql;

  DROP TRIGGER IF EXISTS audit_events_no_modify ON audit_events;
  CREATE TRIGGER audit_events_no_modify
    BEFORE UPDATE OR DELETE ON audit_events
    FOR EACH ROW EXECUTE FUNCTION audit_events_append_only();
`;

export interface PostgresConnection {
  db: PostgresDb;
  close(): Promise<void>;
}

/**
 * Initialize PostgreSQL database connection and run migrations.
 *
 * @throws Error if the connection fails or the user lacks CREATE rights
 */
export async function initializePostgres(
  config: PostgresConfig,
  logger: Logger
): Promise<PostgresConnection> {
  const pg = await import('pg');

  // Create connection pool
  const pool = new pg.default.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: config.ssl_reject_unauthorized ?? true } : false,
    max: config.pool_size,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected PostgreSQL pool error');
  });

  // Test connection
  try {
    const client = await pool.connect();
    client.release();
    logger.debug('PostgreSQL connection test successful');
  } catch (err) {
    await pool.end();
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to connect to PostgreSQL: ${message}`);
  }

  // Run migrations (create tables if not exist)
  try {
    await pool.query(POSTGRES_MIGRATIONS);
    logger.info('PostgreSQL tables initialized successfully');
  } catch (err) {
    await pool.end();
    if (isPermissionError(err)) {
      logger.error(
        'PostgreSQL permission denied. The database user does not have CREATE TABLE rights.\n' +
          'Either grant CREATE permissions to the user, or create tables manually.'
      );
      throw new Error('PostgreSQL initialization failed: insufficient permissions');
    }
    throw err;
  }

  return {
    db: drizzle(pool, { schema }),
    close: async () => {
      await pool.end();
    },
  };
}
