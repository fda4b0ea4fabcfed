import type { AppDb } from '../connection.js';

/**
 * Database handle passed to repository factories
 */
export interface DatabaseDeps {
  db: AppDb;
}

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}
