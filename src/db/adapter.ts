/**
 * Database context normalizing the two supported backends.
 *
 * SQLite (better-sqlite3) is synchronous: queries end in .get(), .all() or .run().
 * PostgreSQL (node-postgres) is asynchronous: queries are awaited and return row arrays.
 *
 * The repositories in src/storage switch on `type` once and stay fully typed afterwards.
 */

import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as sqliteSchema from './schema.js';
import type { PostgresDb } from './postgres.js';

export type DatabaseType = 'sqlite' | 'postgres';

export type SQLiteDb = BetterSQLite3Database<typeof sqliteSchema>;

interface BaseContext {
  /**
   * Close the database connection
   */
  close(): Promise<void>;
}

export interface SQLiteContext extends BaseContext {
  readonly type: 'sqlite';
  readonly db: SQLiteDb;
}

export interface PostgresContext extends BaseContext {
  readonly type: 'postgres';
  readonly db: PostgresDb;
}

export type DatabaseContext = SQLiteContext | PostgresContext;
