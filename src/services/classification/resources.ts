/**
 * Loads the intent keyword tables, semantic prototypes and phrase
 * translations from resources/intent.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { projectRoot } from '../../config/index.js';
import { createValidationError } from '../../core/errors.js';
import type { ClassificationResources } from './types.js';

const keywordEntrySchema = z.object({
  keyword: z.string().min(1),
  weight: z.number().positive(),
  domains: z.array(z.string()),
});

const intentTableSchema = z.object({
  normalizer: z.number().positive(),
  keywords: z.object({
    en: z.array(keywordEntrySchema),
    zh: z.array(keywordEntrySchema),
  }),
});

const ruleKeywordsSchema = z.object({
  aggregate: intentTableSchema,
  retrieval: intentTableSchema,
  reminder: intentTableSchema,
});

const prototypesSchema = z.object({
  aggregate: z.array(z.string()),
  retrieval: z.array(z.string()),
  reminder: z.array(z.string()),
});

const phrasePairSchema = z.tuple([z.string(), z.string()]);

const translationsSchema = z.object({
  zhToEn: z.array(phrasePairSchema),
  enToZh: z.array(phrasePairSchema),
});

export function getResourcesDir(): string {
  return resolve(projectRoot, 'resources/intent');
}

function readJson<T>(fileName: string, schema: z.ZodType<T>, dir: string): T {
  const filePath = resolve(dir, fileName);
  const result = schema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
  if (!result.success) {
    throw createValidationError(fileName, result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return result.data;
}

let cached: ClassificationResources | null = null;

/**
 * Read and validate the classification tables. Cached after the first call.
 */
export function loadClassificationResources(dir: string = getResourcesDir()): ClassificationResources {
  if (cached && dir === getResourcesDir()) return cached;

  const resources: ClassificationResources = {
    ruleKeywords: readJson('rule-keywords.json', ruleKeywordsSchema, dir),
    prototypes: readJson('semantic-prototypes.json', prototypesSchema, dir),
    translations: readJson('phrase-translations.json', translationsSchema, dir),
  };

  if (dir === getResourcesDir()) cached = resources;
  return resources;
}
