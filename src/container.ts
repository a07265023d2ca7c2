/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes
 * Supabase indexes and OpenAI providers; tests pass in-memory doubles.
 */

import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ISynthesisProvider } from './providers/ISynthesisProvider.js';
import type { ISimilarityIndex } from './stores/ISimilarityIndex.js';
import type { ChainPayload, ChunkPayload } from './stores/codecs.js';
import type { Middleware } from './middleware/pipeline.js';
import { RetrievalService } from './services/RetrievalService.js';
import { RecommendationService } from './services/RecommendationService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  retrievalService: RetrievalService;
  recommendationService: RecommendationService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  chainIndex: ISimilarityIndex<ChainPayload>;
  knowledgeIndex: ISimilarityIndex<ChunkPayload>;
  embeddingProvider: IEmbeddingProvider;
  synthesisProvider: ISynthesisProvider;
  logProvider: ILogProvider;
  knowledgeResults?: number;
  clock?: () => number;
}): Container {
  const retrievalService = new RetrievalService(
    deps.embeddingProvider,
    deps.chainIndex,
    deps.knowledgeIndex,
    deps.logProvider.child({ component: 'retrieval' })
  );
  const recommendationService = new RecommendationService(
    retrievalService,
    deps.synthesisProvider,
    deps.logProvider.child({ component: 'recommendation' }),
    { knowledgeResults: deps.knowledgeResults, clock: deps.clock }
  );
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    retrievalService,
    recommendationService,
    logProvider: deps.logProvider,
    logging,
  };
}
