/**
 * CLI Engine Context
 *
 * Loads the records file and builds the default engine for one command run.
 */

import { resolve } from 'node:path';
import { createDefaultQueryEngine, type DefaultQueryEngine } from '../../core/engine.js';
import { loadRecordsFile } from '../../services/domain/in-memory-data-access.js';

export const DEFAULT_DATA_FILE = 'data/records.json';

export interface DataOptions {
  data?: string;
}

export function createCliEngine(options: DataOptions): DefaultQueryEngine {
  const records = loadRecordsFile(resolve(options.data ?? DEFAULT_DATA_FILE));
  return createDefaultQueryEngine(records);
}
