// Main entry point for life-query-core (library usage)

export * from './core/types.js';
export * from './core/errors.js';
export type * from './core/interfaces/index.js';
export {
  createQueryEngine,
  createDefaultQueryEngine,
  type QueryEngine,
  type QueryEngineDeps,
  type QueryEngineOverrides,
  type DefaultQueryEngine,
  type DefaultQueryEngineOptions,
} from './core/engine.js';

export { config, type Config } from './config/index.js';

export * from './services/aggregation/index.js';
export * from './services/classification/index.js';
export * from './services/domain/index.js';
export * from './services/embedding/index.js';
export * from './services/llm/index.js';
export * from './services/processing/index.js';
export * from './services/query/index.js';
export * from './services/rag/index.js';
export * from './services/routing/index.js';
export * from './services/chunking/index.js';

export { createDatabaseConnection, type AppDb, type DatabaseConnection } from './db/connection.js';
export { createEmbeddingsRepository } from './db/repositories/embeddings.js';
