/**
 * Recommendation orchestration.
 * Validates a query, retrieves chains and supporting knowledge, has the
 * synthesis capability explain them, and assembles the response envelope.
 * Any failure aborts the query; no partial envelope is returned.
 */

import type {
  ISynthesisProvider,
  SynthesisInput,
  SynthesisOutput,
} from '../providers/ISynthesisProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { RetrievalService } from './RetrievalService.js';
import { InvalidInputError, SynthesisFailedError, describeError } from '../errors.js';
import type {
  ChainFilters,
  PluginChain,
  RecommendationQuery,
  ResponseEnvelope,
  SimilarityHit,
} from '../types/models.js';

export const DEFAULT_MAX_RESULTS = 5;
export const MAX_MAX_RESULTS = 20;
export const DEFAULT_KNOWLEDGE_RESULTS = 3;

export interface RecommendationServiceOptions {
  /** Knowledge-base chunks gathered per query. 0 skips the knowledge search. */
  knowledgeResults?: number;
  /** Monotonic milliseconds. Injectable for tests. */
  clock?: () => number;
}

/**
 * Human-readable rendering of the effective query. Descriptive only;
 * never parsed back.
 */
export function buildQueryContext(query: RecommendationQuery): string {
  let context = `Query: ${query.text}`;
  if (query.genre) context += ` | Genre: ${query.genre}`;
  if (query.instrument) context += ` | Instrument: ${query.instrument}`;
  if (query.ownedPlugins && query.ownedPlugins.length > 0) {
    context += ` | Owned plugins: ${query.ownedPlugins.join(', ')}`;
  }
  return context;
}

export class RecommendationService {
  private readonly knowledgeResults: number;
  private readonly clock: () => number;

  constructor(
    private readonly retrieval: RetrievalService,
    private readonly synthesis: ISynthesisProvider,
    private readonly logger: ILogProvider,
    options?: RecommendationServiceOptions
  ) {
    this.knowledgeResults = options?.knowledgeResults ?? DEFAULT_KNOWLEDGE_RESULTS;
    this.clock = options?.clock ?? (() => performance.now());
  }

  async submitQuery(query: RecommendationQuery): Promise<ResponseEnvelope> {
    const maxResults = validateQuery(query);
    const start = this.clock();

    const context = buildQueryContext(query);

    // Chain and knowledge searches are independent; run them together.
    const [chains, knowledge] = await Promise.all([
      this.retrieval.searchChains(query.text, {
        genre: query.genre,
        instrument: query.instrument,
        limit: maxResults,
      }),
      this.knowledgeResults > 0
        ? this.retrieval.searchKnowledge(query.text, this.knowledgeResults)
        : Promise.resolve([]),
    ]);

    const synthesis = await this.synthesize({ query, context, chains, knowledge });

    // Retrieval order is kept; synthesis never re-sorts.
    const recommendations = chains.map(({ item, score }) => ({
      chain: item,
      similarityScore: score,
      explanation: synthesis.explanation,
      confidence: synthesis.confidence,
    }));

    const searchTimeMs = Math.max(0, this.clock() - start);

    this.logger.debug('Recommendation query served', {
      results: recommendations.length,
      knowledge: knowledge.length,
      confidence: synthesis.confidence,
      searchTimeMs,
    });

    return {
      recommendations,
      queryContext: context,
      totalResults: recommendations.length,
      searchTimeMs,
      tips: synthesis.tips,
    };
  }

  /** Retrieval without synthesis. */
  async searchChainsDirect(
    text: string,
    filters: ChainFilters,
    limit: number = DEFAULT_MAX_RESULTS
  ): Promise<Array<SimilarityHit<PluginChain>>> {
    return this.retrieval.searchChains(text, { ...filters, limit });
  }

  addChain(chain: PluginChain): Promise<string> {
    return this.retrieval.addChain(chain);
  }

  initialize(): Promise<void> {
    return this.retrieval.initialize();
  }

  // ── Private ──

  private async synthesize(input: SynthesisInput): Promise<SynthesisOutput> {
    try {
      return await this.synthesis.synthesize(input);
    } catch (err) {
      if (err instanceof SynthesisFailedError) throw err;
      throw new SynthesisFailedError(`Synthesis failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

/** Returns the result limit, defaulted when unset. */
function validateQuery(query: RecommendationQuery): number {
  if (typeof query.text !== 'string' || query.text.trim().length === 0) {
    throw new InvalidInputError('query text must not be empty');
  }

  const maxResults = query.maxResults ?? DEFAULT_MAX_RESULTS;
  if (!Number.isInteger(maxResults) || maxResults < 1) {
    throw new InvalidInputError('maxResults must be a positive integer', {
      maxResults,
    });
  }
  if (maxResults > MAX_MAX_RESULTS) {
    throw new InvalidInputError(`maxResults must be at most ${MAX_MAX_RESULTS}`, {
      maxResults,
    });
  }

  return maxResults;
}
