/**
 * Centralized configuration module for life-query-core
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Add its schema to `configSchema` below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.database.path);
 */

import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  runtimeSection,
  databaseSection,
  retrySection,
  embeddingSection,
  llmSection,
  classificationSection,
  ragSection,
} from './registry/index.js';
import { projectRoot } from './registry/parsers.js';
import { loadEnv } from './env.js';

loadEnv(projectRoot);

// =============================================================================
// CONFIG SCHEMA (composed from registry sections)
// =============================================================================

const { options: log } = loggingSection;
const { options: rt } = runtimeSection;
const { options: db } = databaseSection;
const { options: retry } = retrySection;
const { options: emb } = embeddingSection;
const { options: llm } = llmSection;
const { options: cls } = classificationSection;
const { options: rag } = ragSection;

const configSchema = z.object({
  logging: z.object({
    level: log.level.schema,
    debug: log.debug.schema,
  }),
  runtime: z.object({
    nodeEnv: rt.nodeEnv.schema,
    projectRoot: rt.projectRoot.schema,
  }),
  database: z.object({
    path: db.path.schema,
    busyTimeoutMs: db.busyTimeoutMs.schema,
  }),
  retry: z.object({
    maxAttempts: retry.maxAttempts.schema,
    initialDelayMs: retry.initialDelayMs.schema,
    maxDelayMs: retry.maxDelayMs.schema,
    backoffMultiplier: retry.backoffMultiplier.schema,
  }),
  embedding: z.object({
    provider: emb.provider.schema,
    baseUrl: emb.baseUrl.schema,
    model: emb.model.schema,
    apiKey: emb.apiKey.schema,
    batchSize: emb.batchSize.schema,
    batchDelayMs: emb.batchDelayMs.schema,
    cacheSize: emb.cacheSize.schema,
  }),
  llm: z.object({
    enabled: llm.enabled.schema,
    baseUrl: llm.baseUrl.schema,
    model: llm.model.schema,
    apiKey: llm.apiKey.schema,
    temperature: llm.temperature.schema,
    maxTokens: llm.maxTokens.schema,
    timeoutMs: llm.timeoutMs.schema,
  }),
  classification: z.object({
    ruleWeight: cls.ruleWeight.schema,
    semanticWeight: cls.semanticWeight.schema,
    llmWeight: cls.llmWeight.schema,
    penaltyWeight: cls.penaltyWeight.schema,
    hybridThreshold: cls.hybridThreshold.schema,
    semanticBaseThreshold: cls.semanticBaseThreshold.schema,
    semanticThresholdStep: cls.semanticThresholdStep.schema,
    semanticMinThreshold: cls.semanticMinThreshold.schema,
    semanticMaxThreshold: cls.semanticMaxThreshold.schema,
    highConfidenceThreshold: cls.highConfidenceThreshold.schema,
    useLlm: cls.useLlm.schema,
  }),
  rag: z.object({
    chunkMaxTokens: rag.chunkMaxTokens.schema,
    chunkOverlapTokens: rag.chunkOverlapTokens.schema,
    minScore: rag.minScore.schema,
    answerLimit: rag.answerLimit.schema,
    contextBudgetChars: rag.contextBudgetChars.schema,
    scanLimit: rag.scanLimit.schema,
  }),
});

export type Config = z.infer<typeof configSchema>;

const sectionKeys = [
  'logging',
  'runtime',
  'database',
  'retry',
  'embedding',
  'llm',
  'classification',
  'rag',
] as const satisfies ReadonlyArray<keyof Config>;

/**
 * Build configuration from registry metadata.
 * Throws a validation error listing every invalid option.
 */
export function buildConfig(): Config {
  const built = validateConfig(buildConfigFromRegistry(configRegistry), configSchema);
  built.runtime.projectRoot = projectRoot;
  return built;
}

// Create the singleton config instance
export const config: Config = buildConfig();

function assignSections(target: Config, source: Config): void {
  for (const key of sectionKeys) {
    Object.assign(target[key], source[key]);
  }
}

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 * Prefer using snapshotConfig/restoreConfig for test isolation.
 */
export function reloadConfig(): void {
  assignSections(config, buildConfig());
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

/**
 * Create a snapshot of the current config state.
 * Use with restoreConfig() for test isolation.
 */
export function snapshotConfig(): Config {
  return structuredClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  assignSections(config, snapshot);
}

/**
 * Run a test function with temporary environment variable overrides.
 * Automatically saves config state, applies env changes, and restores on completion.
 *
 * @example
 * await withTestEnv({ LIFEQ_RAG_MIN_SCORE: '0.5' }, async () => {
 *   expect(config.rag.minScore).toBe(0.5);
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  try {
    for (const [key, value] of Object.entries(envOverrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    reloadConfig();

    return await testFn();
  } finally {
    for (const [key, value] of Object.entries(envSnapshot)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    restoreConfig(configSnapshot);
  }
}

export { configRegistry } from './registry/index.js';
export { projectRoot } from './registry/parsers.js';

export default config;
