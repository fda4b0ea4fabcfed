/**
 * In-memory DomainDataAccess
 *
 * Holds records grouped by domain; the CLI fills it from a JSON file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import {
  DOMAIN_NAMES,
  type DateBounds,
  type DomainDataAccess,
  type DomainName,
  type DomainRecord,
} from '../../core/types.js';
import { createNotFoundError, createValidationError, getErrorMessage } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('data-access');

export class InMemoryDataAccess implements DomainDataAccess {
  private readonly byDomain = new Map<DomainName, DomainRecord[]>();

  constructor(records: readonly DomainRecord[] = []) {
    this.addAll(records);
  }

  add(record: DomainRecord): void {
    const list = this.byDomain.get(record.domain) ?? [];
    list.push(record);
    this.byDomain.set(record.domain, list);
  }

  addAll(records: readonly DomainRecord[]): void {
    for (const record of records) this.add(record);
  }

  /**
   * Records of a domain, oldest first. Both bounds are inclusive.
   */
  async getRecords(domain: DomainName, bounds: DateBounds = {}): Promise<DomainRecord[]> {
    const start = bounds.start?.getTime();
    const end = bounds.end?.getTime();
    return (this.byDomain.get(domain) ?? [])
      .filter((record) => {
        const time = record.timestamp.getTime();
        return (start === undefined || time >= start) && (end === undefined || time <= end);
      })
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  count(): number {
    let total = 0;
    for (const domain of DOMAIN_NAMES) {
      total += this.byDomain.get(domain)?.length ?? 0;
    }
    return total;
  }
}

/** Namespace for ids derived from record content */
const RECORD_ID_NAMESPACE = '0b6f3c1e-4a2d-5e8f-9c7b-1d2e3f4a5b6c';

/**
 * JSON with object keys sorted at every level
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Stable id for a record that has none: the same content loads with the same id.
 */
export function deriveRecordId(domain: DomainName, timestamp: Date, data: Record<string, unknown>): string {
  return uuidv5(`${domain}|${timestamp.toISOString()}|${canonicalJson(data)}`, RECORD_ID_NAMESPACE);
}

const recordFileSchema = z.array(
  z.object({
    id: z.string().min(1).optional(),
    domain: z.enum(DOMAIN_NAMES),
    timestamp: z.coerce.date(),
    data: z.record(z.unknown()).default({}),
  })
);

/**
 * Parse `[{ id?, domain, timestamp, data }]`, throwing a validation error on bad shape.
 * Records without an id get one derived from their content.
 */
export function parseRecordsJson(json: string): DomainRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw createValidationError('data', `invalid JSON: ${getErrorMessage(error)}`);
  }

  const result = recordFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw createValidationError(
      path ? `data.${path}` : 'data',
      issue?.message ?? 'invalid records',
      'Each record needs domain, timestamp and data'
    );
  }
  return result.data.map((record) => ({
    ...record,
    id: record.id ?? deriveRecordId(record.domain, record.timestamp, record.data),
  }));
}

export function loadRecordsFile(filePath: string): DomainRecord[] {
  if (!existsSync(filePath)) {
    throw createNotFoundError('records file', filePath);
  }
  const records = parseRecordsJson(readFileSync(filePath, 'utf-8'));
  logger.debug({ filePath, count: records.length }, 'Loaded records');
  return records;
}

export function createInMemoryDataAccess(records: readonly DomainRecord[] = []): InMemoryDataAccess {
  return new InMemoryDataAccess(records);
}
