/**
 * Core domain types and collaborator interfaces.
 *
 * The engine depends only on these interfaces; concrete adapters
 * (in-memory data, OpenAI-compatible providers, SQLite store) are injected.
 */

// =============================================================================
// DOMAINS AND RECORDS
// =============================================================================

export const DOMAIN_NAMES = [
  'events',
  'education',
  'career',
  'meals',
  'journals',
  'health_metrics',
  'finance_records',
  'tasks_habits',
  'relations',
  'media_logs',
  'travel_logs',
] as const;

export type DomainName = (typeof DOMAIN_NAMES)[number];

export function isDomainName(value: string): value is DomainName {
  return DOMAIN_NAMES.some((name) => name === value);
}

/**
 * One personal record. `data` holds domain-specific fields
 * (amount/category for finance, name/calories for meals, ...).
 */
export interface DomainRecord {
  id: string;
  domain: DomainName;
  timestamp: Date;
  data: Record<string, unknown>;
}

export interface DateBounds {
  start?: Date;
  end?: Date;
}

/**
 * Read-only access to personal records
 */
export interface DomainDataAccess {
  getRecords(domain: DomainName, bounds?: DateBounds): Promise<DomainRecord[]>;
}

// =============================================================================
// PROVIDER CAPABILITIES
// =============================================================================

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Turns a conversation into one reply. May throw when the model is unavailable.
 */
export interface ChatCompleter {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

/**
 * Turns texts into fixed-length vectors, one per input, in order.
 */
export interface Embedder {
  readonly dimension: number;
  embed(texts: string[]): Promise<number[][]>;
}

// =============================================================================
// QUERY CONTEXT
// =============================================================================

export const TIME_PERIODS = [
  'today',
  'thisWeek',
  'lastWeek',
  'thisMonth',
  'lastMonth',
  'thisYear',
  'lastYear',
] as const;

export type TimePeriod = (typeof TIME_PERIODS)[number];

export interface TimeRange {
  start?: Date;
  end?: Date;
  period?: TimePeriod;
}

export type QueryIntent = 'search' | 'analysis' | 'advice' | 'summary' | 'comparison';

/** Equality filter, or membership when the value is an array */
export type FilterValue = string | readonly string[];

export type QueryFilters = Readonly<Record<string, FilterValue>>;

export interface QueryContext {
  readonly originalQuery: string;
  readonly intent: QueryIntent;
  readonly keywords: readonly string[];
  readonly timeRange?: TimeRange;
  readonly filters: QueryFilters;
  readonly targetDomains: readonly DomainName[];
}

export interface QueryPlanner {
  plan(query: string): QueryContext;
}
