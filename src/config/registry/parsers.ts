/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// PROJECT ROOT
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Nearest ancestor holding package.json, so the root is the same whether
 * running from src/ or from the compiled dist/src/.
 */
function findProjectRoot(start: string): string {
  let dir = start;
  while (!existsSync(resolve(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return resolve(start, '../../..');
    dir = parent;
  }
  return dir;
}

export const projectRoot = findProjectRoot(__dirname);

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Expand tilde (~) to home directory in file paths.
 * Supports both Unix-style HOME and Windows-style USERPROFILE.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Get the base data directory.
 * Priority:
 * 1. LIFEQ_DATA_DIR environment variable (highest)
 * 2. ~/.life-query/data (when installed as package via node_modules)
 * 3. projectRoot/data (development mode)
 */
export function getDataDir(): string {
  const dataDir = process.env.LIFEQ_DATA_DIR;
  if (dataDir) {
    return expandTilde(dataDir);
  }
  if (__dirname.includes('node_modules')) {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    if (home) {
      return resolve(home, '.life-query', 'data');
    }
  }
  return resolve(projectRoot, 'data');
}

/**
 * Resolve a data path with priority:
 * 1. Specific env var override (highest priority)
 * 2. LIFEQ_DATA_DIR + relative path
 * 3. projectRoot/data + relative path (default)
 *
 * SQLite's ':memory:' passes through untouched.
 */
export function resolveDataPath(envVar: string | undefined, relativePath: string): string {
  if (envVar) {
    return envVar === ':memory:' ? envVar : expandTilde(envVar);
  }
  return resolve(getDataDir(), relativePath);
}
