/**
 * Database Connection
 *
 * Opens the SQLite embedding store, applies migrations and wraps it in drizzle.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { initializeDatabase } from './init.js';
import { config } from '../config/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { ErrorCodes, DatabaseError, getErrorMessage } from '../core/errors.js';

const logger = createComponentLogger('connection');

export type AppDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  db: AppDb;
  sqlite: Database.Database;
  close(): void;
}

export interface ConnectionOptions {
  /** File path or ':memory:'; defaults to config.database.path */
  dbPath?: string;
  busyTimeoutMs?: number;
}

const MEMORY_PATH = ':memory:';

/**
 * Create a SQLite connection with the schema applied
 */
export function createDatabaseConnection(options: ConnectionOptions = {}): DatabaseConnection {
  const dbPath = options.dbPath ?? config.database.path;
  const busyTimeoutMs = options.busyTimeoutMs ?? config.database.busyTimeoutMs;

  if (dbPath !== MEMORY_PATH) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(dbPath, { timeout: busyTimeoutMs });
  } catch (error) {
    throw new DatabaseError(
      `Failed to create database connection: ${getErrorMessage(error)}`,
      ErrorCodes.CONNECTION_ERROR,
      { dbPath }
    );
  }

  if (dbPath !== MEMORY_PATH) {
    // WAL lets the CLI read while a rebuild writes
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma(`busy_timeout = ${busyTimeoutMs}`);

  initializeDatabase(sqlite);
  logger.debug({ dbPath }, 'Database ready');

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
