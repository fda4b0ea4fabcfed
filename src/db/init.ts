/**
 * Database initialization and migration module
 *
 * Applies SQL migrations from src/db/migrations once each, tracked in `_migrations`.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { projectRoot } from '../config/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { DatabaseError, ErrorCodes, getErrorMessage } from '../core/errors.js';

const logger = createComponentLogger('init');

export interface InitResult {
  migrationsApplied: string[];
}

const migrationRowsSchema = z.array(z.object({ name: z.string() }));

export function getMigrationsDir(): string {
  return resolve(projectRoot, 'src/db/migrations');
}

/**
 * Create the migrations tracking table if it doesn't exist
 */
function ensureMigrationTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
    )
  `);
}

function getAppliedMigrations(sqlite: Database.Database): Set<string> {
  ensureMigrationTable(sqlite);
  const rows = migrationRowsSchema.parse(sqlite.prepare('SELECT name FROM _migrations ORDER BY id').all());
  return new Set(rows.map((r) => r.name));
}

/**
 * Migration files sorted by name (0000_, 0001_, ...)
 */
export function getMigrationFiles(): string[] {
  const dir = getMigrationsDir();
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Split a migration on drizzle-kit statement breakpoints
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(/-->\s*statement-breakpoint/i)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Apply every pending migration inside one transaction per file.
 */
export function initializeDatabase(sqlite: Database.Database): InitResult {
  const applied = getAppliedMigrations(sqlite);
  const migrationsApplied: string[] = [];

  for (const name of getMigrationFiles()) {
    if (applied.has(name)) continue;

    const statements = splitStatements(readFileSync(resolve(getMigrationsDir(), name), 'utf-8'));
    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        sqlite.exec(statement);
      }
      sqlite.prepare('INSERT INTO _migrations (name) VALUES (?)').run(name);
    });

    try {
      apply();
    } catch (error) {
      throw new DatabaseError(`Migration ${name} failed: ${getErrorMessage(error)}`, ErrorCodes.MIGRATION_ERROR, {
        migration: name,
      });
    }

    migrationsApplied.push(name);
  }

  if (migrationsApplied.length > 0) {
    logger.debug({ migrations: migrationsApplied }, 'Applied migrations');
  }

  return { migrationsApplied };
}
