/**
 * Query Engine Factory
 *
 * Wires planner, classifier, router, aggregator, RAG pipeline and processor
 * behind a single `routeAndProcess` entry point.
 */

import { config } from '../config/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { getErrorMessage } from './errors.js';
import type { ChatCompleter, DomainDataAccess, DomainRecord, Embedder, QueryPlanner } from './types.js';
import type { EmbeddingStore } from './interfaces/embedding-store.js';
import { createDatabaseConnection } from '../db/connection.js';
import { createEmbeddingsRepository } from '../db/repositories/embeddings.js';
import { DataAggregator } from '../services/aggregation/data-aggregator.js';
import {
  IntentClassifier,
  type IntentClassifierOptions,
} from '../services/classification/intent-classifier.js';
import { InMemoryDataAccess } from '../services/domain/in-memory-data-access.js';
import { EmbeddingService } from '../services/embedding/embedding.service.js';
import { EmbeddingStatus } from '../services/embedding/status.js';
import { createChatCompleter, createEmbeddingBackend } from '../services/llm/adapters.js';
import { createLlmClient } from '../services/llm/client.js';
import { RequestProcessor, errorResult } from '../services/processing/request-processor.js';
import type { ProcessingResult } from '../services/processing/types.js';
import { DefaultQueryPlanner } from '../services/query/query-planner.js';
import { RagPipeline } from '../services/rag/rag-pipeline.js';
import type { PromptTemplates, RagOptions, RebuildProgressCallback, RebuildResult } from '../services/rag/types.js';
import { RequestRouter, fusionWeightsFromConfig } from '../services/routing/router.js';
import type { FusionWeights, Routing } from '../services/routing/types.js';

const logger = createComponentLogger('engine');

export interface QueryEngineOverrides {
  rag?: Partial<RagOptions>;
  fusion?: Partial<FusionWeights>;
  classifier?: IntentClassifierOptions;
  /** Milliseconds clock used for processing times */
  clock?: () => number;
}

export interface QueryEngineDeps {
  dataAccess: DomainDataAccess;
  store: EmbeddingStore;
  embedder: Embedder | null;
  chat: ChatCompleter | null;
  planner?: QueryPlanner;
  promptTemplates?: PromptTemplates;
  overrides?: QueryEngineOverrides;
}

export interface QueryEngine {
  /** Route and execute a query. Never throws. */
  routeAndProcess(query: string): Promise<ProcessingResult>;
  route(query: string): Promise<Routing>;
  rebuildEmbeddings(onProgress?: RebuildProgressCallback): Promise<RebuildResult>;
  readonly embeddingStatus: EmbeddingStatus;
  readonly aggregator: DataAggregator;
  readonly rag: RagPipeline;
}

export function createQueryEngine(deps: QueryEngineDeps): QueryEngine {
  const overrides = deps.overrides ?? {};
  const clock = overrides.clock ?? (() => Date.now());
  const embeddingStatus = new EmbeddingStatus();

  const rag = new RagPipeline({
    store: deps.store,
    dataAccess: deps.dataAccess,
    embedder: deps.embedder,
    chat: deps.chat,
    status: embeddingStatus,
    options: overrides.rag,
  });
  const aggregator = new DataAggregator(deps.dataAccess);
  const classifier = new IntentClassifier(deps.chat, overrides.classifier);
  const router = new RequestRouter(deps.planner ?? new DefaultQueryPlanner(), classifier, {
    ...fusionWeightsFromConfig(),
    ...overrides.fusion,
  });
  const processor = new RequestProcessor({
    aggregator,
    rag,
    promptTemplates: deps.promptTemplates,
    clock,
  });

  return {
    embeddingStatus,
    aggregator,
    rag,

    route: (query) => router.route(query),

    async routeAndProcess(query: string): Promise<ProcessingResult> {
      const started = clock();
      try {
        const routing = await router.route(query);
        return await processor.processRequest(routing);
      } catch (error) {
        logger.error({ error: getErrorMessage(error) }, 'Routing failed');
        return errorResult(query, error, clock() - started);
      }
    },

    rebuildEmbeddings: (onProgress) => rag.rebuildEmbeddings(onProgress),
  };
}

// =============================================================================
// DEFAULT WIRING
// =============================================================================

export interface DefaultQueryEngineOptions {
  /** Defaults to config.database.path */
  dbPath?: string;
  promptTemplates?: PromptTemplates;
}

export interface DefaultQueryEngine {
  engine: QueryEngine;
  dataAccess: InMemoryDataAccess;
  close(): void;
}

/**
 * Engine over in-memory records, the SQLite embedding store and the
 * configured OpenAI-compatible providers.
 */
export function createDefaultQueryEngine(
  records: readonly DomainRecord[],
  options: DefaultQueryEngineOptions = {}
): DefaultQueryEngine {
  const connection = createDatabaseConnection({ dbPath: options.dbPath });
  const dataAccess = new InMemoryDataAccess(records);

  const chat = config.llm.enabled ? createChatCompleter(createLlmClient()) : null;

  let embedder: Embedder | null = null;
  if (config.embedding.provider !== 'disabled') {
    const embeddingClient = createLlmClient({
      baseUrl: config.embedding.baseUrl,
      apiKey: config.embedding.apiKey,
    });
    embedder = new EmbeddingService(
      createEmbeddingBackend(embeddingClient, config.embedding.model, config.embedding.provider)
    );
  }

  logger.info(
    {
      records: records.length,
      llm: chat !== null,
      embeddingProvider: config.embedding.provider,
    },
    'Query engine ready'
  );

  const engine = createQueryEngine({
    dataAccess,
    store: createEmbeddingsRepository({ db: connection.db, scanLimit: config.rag.scanLimit }),
    embedder,
    chat,
    promptTemplates: options.promptTemplates,
  });

  return { engine, dataAccess, close: connection.close };
}
