/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { loggingSection } from './sections/logging.js';
import { runtimeSection } from './sections/runtime.js';
import { databaseSection } from './sections/database.js';
import { retrySection } from './sections/retry.js';
import { embeddingSection } from './sections/embedding.js';
import { llmSection } from './sections/llm.js';
import { classificationSection } from './sections/classification.js';
import { ragSection } from './sections/rag.js';

export {
  loggingSection,
  runtimeSection,
  databaseSection,
  retrySection,
  embeddingSection,
  llmSection,
  classificationSection,
  ragSection,
};

/**
 * The complete config registry with all sections.
 */
export const configRegistry = {
  sections: {
    logging: loggingSection,
    runtime: runtimeSection,
    database: databaseSection,
    retry: retrySection,
    embedding: embeddingSection,
    llm: llmSection,
    classification: classificationSection,
    rag: ragSection,
  },
} satisfies ConfigRegistry;

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  validateConfig,
  buildConfigFromRegistry,
  formatZodErrors,
} from './schema-builder.js';
