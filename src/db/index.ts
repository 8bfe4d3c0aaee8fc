import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as sqliteSchema from './schema.js';
import { initializePostgres } from './postgres.js';
import type { DatabaseContext, SQLiteContext } from './adapter.js';
import type { Config } from '../config/index.js';
import type { Logger } from 'pino';
import fs from 'fs';
import path from 'path';

export const IN_MEMORY_PATH = ':memory:';

/**
 * Initialize SQLite database. `:memory:` opens a private in-process database.
 */
export function initializeSQLite(dbPath: string, logger?: Logger): SQLiteContext {
  const inMemory = dbPath === IN_MEMORY_PATH;

  if (!inMemory) {
    // Ensure data directory exists with restrictive permissions
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
  }

  // Initialize SQLite with WAL mode
  const sqlite = new Database(dbPath);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  if (!inMemory) {
    // Set restrictive permissions on database file
    try {
      fs.chmodSync(dbPath, 0o600);
    } catch (err) {
      // On Windows, chmod may not be supported; ignore errors there.
      if (process.platform !== 'win32') {
        logger?.warn({ err, dbPath }, 'Failed to set restrictive permissions (0600) on database file');
      }
    }
  }

  // Run inline migrations (create tables if not exist)
  runSQLiteMigrations(sqlite);

  return {
    type: 'sqlite',
    db: drizzle(sqlite, { schema: sqliteSchema }),
    close: async () => {
      sqlite.close();
    },
  };
}

/**
 * SQLite migrations (create tables if not exist)
 */
function runSQLiteMigrations(sqlite: Database.Database) {
  sqlite.exec(`
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

    CREATE TABLE IF NOT EXISTS audit_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
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

    -- Audit trail is append-only
    CREATE TRIGGER IF NOT EXISTS audit_events_no_update
      BEFORE UPDATE ON audit_events
      BEGIN SELECT RAISE(ABORT, 'audit_events is append-only'); END;
    CREATE TRIGGER IF NOT EXISTS audit_events_no_delete
      BEFORE DELETE ON audit_events
      BEGIN SELECT RAISE(ABORT, 'audit_events is append-only'); END;
  `);
}

/**
 * Initialize database based on configuration.
 */
export async function initializeDatabase(config: Config, logger: Logger): Promise<DatabaseContext> {
  if (config.storage.type === 'postgres') {
    if (!config.storage.postgres) {
      throw new Error(
        'PostgreSQL configuration missing. Set POSTGRES_HOST, POSTGRES_DATABASE, etc.'
      );
    }
    const { db, close } = await initializePostgres(config.storage.postgres, logger);
    logger.info('Database initialized: PostgreSQL');
    return { type: 'postgres', db, close };
  }

  const context = initializeSQLite(config.storage.path, logger);
  logger.info({ path: config.storage.path }, 'Database initialized: SQLite');
  return context;
}

export type { DatabaseContext, DatabaseType, SQLiteContext, PostgresContext } from './adapter.js';
