/**
 * Typed views over DomainRecord.data for the domains the aggregator reads
 */

import { z } from 'zod';
import type { DomainRecord } from '../../core/types.js';

export const financeFieldsSchema = z.object({
  type: z.string().default('expense'),
  amount: z.number(),
  category: z.string().optional(),
  notes: z.string().optional(),
  currency: z.string().optional(),
});

export const mealFieldsSchema = z.object({
  name: z.string().default('Unnamed meal'),
  calories: z.number().optional(),
  location: z.string().optional(),
});

export const eventFieldsSchema = z.object({
  title: z.string().default('Untitled event'),
});

export const healthFieldsSchema = z.object({
  metric_type: z.string().default('unknown'),
  value: z.number().default(0),
  unit: z.string().default(''),
});

export type FinanceFields = z.infer<typeof financeFieldsSchema>;
export type MealFields = z.infer<typeof mealFieldsSchema>;
export type EventFields = z.infer<typeof eventFieldsSchema>;
export type HealthFields = z.infer<typeof healthFieldsSchema>;

export interface TypedRecord<T> {
  record: DomainRecord;
  fields: T;
}

/**
 * Records whose data matches the schema; the rest are dropped.
 */
export function parseRecords<T>(records: readonly DomainRecord[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): TypedRecord<T>[] {
  const parsed: TypedRecord<T>[] = [];
  for (const record of records) {
    const result = schema.safeParse(record.data);
    if (result.success) {
      parsed.push({ record, fields: result.data });
    }
  }
  return parsed;
}
