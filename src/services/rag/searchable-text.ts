/**
 * Searchable text per domain
 *
 * Renders a record as labelled lines plus a bilingual KEYWORDS line, which
 * is what gets chunked and embedded.
 */

import { isDomainName, type DomainName, type DomainRecord } from '../../core/types.js';
import { toIsoDate } from '../query/time-range.js';

interface FieldSpec {
  label: string;
  key: string;
  suffixKey?: string;
}

interface DomainRendering {
  fields: readonly FieldSpec[];
  keywords: string;
}

const RENDERINGS: Record<Exclude<DomainName, 'finance_records'>, DomainRendering> = {
  meals: {
    fields: [
      { label: 'MEAL', key: 'name' },
      { label: 'ITEMS', key: 'items' },
      { label: 'CALORIES', key: 'calories' },
      { label: 'LOCATION', key: 'location' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'food, meal, eating, 餐, 食物, 吃, 卡路里',
  },
  journals: {
    fields: [
      { label: 'CONTENT', key: 'content' },
      { label: 'MOOD_SCORE', key: 'mood' },
      { label: 'TOPICS', key: 'topics' },
    ],
    keywords: 'journal, diary, thoughts, mood, 日记, 心情, 情绪, 感想',
  },
  health_metrics: {
    fields: [
      { label: 'METRIC', key: 'metric_type' },
      { label: 'VALUE', key: 'value', suffixKey: 'unit' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'health, fitness, metric, 健康, 身体, 指标',
  },
  events: {
    fields: [
      { label: 'TITLE', key: 'title' },
      { label: 'DESCRIPTION', key: 'description' },
      { label: 'LOCATION', key: 'location' },
      { label: 'TAGS', key: 'tags' },
    ],
    keywords: 'event, activity, 事件, 活动',
  },
  education: {
    fields: [
      { label: 'SCHOOL', key: 'school_name' },
      { label: 'DEGREE', key: 'degree' },
      { label: 'MAJOR', key: 'major' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'education, school, study, learning, 教育, 学习, 学校',
  },
  career: {
    fields: [
      { label: 'COMPANY', key: 'company' },
      { label: 'ROLE', key: 'role' },
      { label: 'ACHIEVEMENTS', key: 'achievements' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'work, career, job, employment, 工作, 职业, 事业',
  },
  tasks_habits: {
    fields: [
      { label: 'TITLE', key: 'title' },
      { label: 'TYPE', key: 'type' },
      { label: 'STATUS', key: 'status' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'task, habit, routine, productivity, 任务, 习惯, 例行',
  },
  relations: {
    fields: [
      { label: 'PERSON', key: 'person_name' },
      { label: 'RELATION', key: 'relation_type' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'relationship, social, people, contact, 关系, 社交, 人际',
  },
  media_logs: {
    fields: [
      { label: 'TITLE', key: 'title' },
      { label: 'TYPE', key: 'media_type' },
      { label: 'PROGRESS', key: 'progress' },
      { label: 'RATING', key: 'rating' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'media, entertainment, 媒体, 娱乐',
  },
  travel_logs: {
    fields: [
      { label: 'PLACE', key: 'place' },
      { label: 'COST', key: 'cost' },
      { label: 'NOTES', key: 'notes' },
    ],
    keywords: 'travel, trip, journey, 旅行, 出行',
  },
};

/**
 * Display form of a field value, or undefined when it is empty, zero or not a scalar/list.
 */
function formatValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() ? value : undefined;
  if (typeof value === 'number') return value > 0 ? String(value) : undefined;
  if (typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const items = value.map(formatValue).filter((item): item is string => item !== undefined);
    return items.length > 0 ? items.join(', ') : undefined;
  }
  return undefined;
}

function stringField(data: Record<string, unknown>, key: string, fallback: string): string {
  const value = data[key];
  return typeof value === 'string' && value.trim() ? value : fallback;
}

function renderFinance(data: Record<string, unknown>, lines: string[]): void {
  const type = stringField(data, 'type', 'unknown');
  const amount = typeof data.amount === 'number' ? data.amount : 0;
  const currency = stringField(data, 'currency', 'CNY');
  const category = stringField(data, 'category', 'uncategorized');
  const notes = stringField(data, 'notes', '');

  lines.push(`TYPE: ${type.toUpperCase()}`);
  lines.push(`AMOUNT: ${amount} ${currency}`);
  lines.push(`CATEGORY: ${category}`);
  if (notes) lines.push(`DESCRIPTION: ${notes}`);

  const keywords = [
    type === 'income' ? 'income revenue earning 收入 收益' : 'spending cost expense payment 支出 花费 消费',
    category.toLowerCase(),
  ];
  if (notes) keywords.push(notes.toLowerCase());
  lines.push(`KEYWORDS: ${keywords.join(' ')}`);
}

function renderFields(data: Record<string, unknown>, rendering: DomainRendering, lines: string[]): void {
  for (const field of rendering.fields) {
    const value = formatValue(data[field.key]);
    if (value === undefined) continue;
    const suffix = field.suffixKey ? formatValue(data[field.suffixKey]) : undefined;
    lines.push(`${field.label}: ${suffix ? `${value} ${suffix}` : value}`);
  }
  lines.push(`KEYWORDS: ${rendering.keywords}`);
}

function renderGeneric(data: Record<string, unknown>, lines: string[]): void {
  for (const [key, raw] of Object.entries(data)) {
    const value = formatValue(raw);
    if (value !== undefined) lines.push(`${key}: ${value}`);
  }
}

export interface SearchableRecord {
  domain: string;
  timestamp: Date;
  data: Record<string, unknown>;
}

export function buildSearchableText(record: SearchableRecord | DomainRecord): string {
  const lines = [`DOMAIN: ${record.domain}`, `DATE: ${toIsoDate(record.timestamp)}`];
  const { domain, data } = record;

  if (!isDomainName(domain)) {
    renderGeneric(data, lines);
  } else if (domain === 'finance_records') {
    renderFinance(data, lines);
  } else {
    renderFields(data, RENDERINGS[domain], lines);
  }

  return lines.join('\n');
}
