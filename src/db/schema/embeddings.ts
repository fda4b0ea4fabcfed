/**
 * Chunk embeddings table
 */

import { sqliteTable, text, blob, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

/**
 * One row per embedded chunk of a domain record. `object_type` is the record's
 * domain and `object_id` its id; rows are replaced whenever the record is re-ingested.
 * Vectors are little-endian float64 arrays.
 */
export const embeddings = sqliteTable(
  'embeddings',
  {
    id: text('id').primaryKey(),
    objectType: text('object_type').notNull(),
    objectId: text('object_id').notNull(),
    chunkText: text('chunk_text').notNull(),
    vector: blob('vector', { mode: 'buffer' }).notNull(),
    recordedAt: text('recorded_at'),
    createdAt: text('created_at')
      .default(sql`CURRENT_TIMESTAMP`)
      .notNull(),
  },
  (table) => [
    index('idx_embeddings_object').on(table.objectType, table.objectId),
    index('idx_embeddings_recorded_at').on(table.recordedAt),
  ]
);

export type EmbeddingRow = typeof embeddings.$inferSelect;
export type NewEmbeddingRow = typeof embeddings.$inferInsert;
