/**
 * Synthesis capability.
 * Turns retrieved candidates into a query-level explanation and confidence.
 * Implementations may call a language model or apply a fixed heuristic;
 * RecommendationService does not depend on which.
 */

import type {
  DocumentChunk,
  PluginChain,
  RecommendationQuery,
  SimilarityHit,
} from '../types/models.js';

export interface SynthesisInput {
  query: RecommendationQuery;
  /** Rendered query context ("Query: ... | Genre: ..."). */
  context: string;
  /** Retrieved chains, best first. */
  chains: Array<SimilarityHit<PluginChain>>;
  /** Supporting knowledge-base chunks, best first. */
  knowledge: Array<SimilarityHit<DocumentChunk>>;
}

export interface SynthesisOutput {
  explanation: string;
  tips: string | null;
  /** In [0, 1]. */
  confidence: number;
}

export interface ISynthesisProvider {
  /** Rejects with SynthesisFailedError when no usable answer is produced. */
  synthesize(input: SynthesisInput): Promise<SynthesisOutput>;
}
