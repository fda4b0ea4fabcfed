export {
  EmbeddingService,
  embeddingConfigFromEnv,
  getEmbeddingDimension,
} from './embedding.service.js';
export type { EmbeddingProvider, EmbeddingServiceConfig } from './embedding.service.js';
export { EmbeddingStatus } from './status.js';
export type { EmbeddingState, EmbeddingStatusEventMap } from './status.js';
