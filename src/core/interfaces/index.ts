export type {
  StoredEmbedding,
  UpsertEmbeddingInput,
  EmbeddingFilter,
  FindSimilarOptions,
  ScoredEmbedding,
  EmbeddingStore,
} from './embedding-store.js';
