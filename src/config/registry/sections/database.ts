/**
 * Database Configuration Section
 *
 * SQLite embedding store settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const databaseSection = {
  name: 'database',
  description: 'SQLite embedding store configuration.',
  options: {
    path: {
      envKey: 'LIFEQ_DB_PATH',
      defaultValue: 'life-query.db',
      description: "Path to the SQLite database file (relative to the data dir), or ':memory:'.",
      schema: z.string(),
      parse: 'path',
    },
    busyTimeoutMs: {
      envKey: 'LIFEQ_DB_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'How long SQLite waits on a locked database before failing.',
      schema: z.number().int().min(0),
    },
  },
} satisfies ConfigSectionMeta;
