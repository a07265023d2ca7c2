/**
 * Chain catalog endpoints.
 * POST /api/v1/chains         — add a chain
 * GET  /api/v1/chains/search  — direct similarity search, no synthesis
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { ChainSearchResponse, CreateChainResponse } from '../types/api.js';
import { DEFAULT_MAX_RESULTS, MAX_MAX_RESULTS } from '../services/RecommendationService.js';
import { parseCreateChainRequest, parseLimit, readJsonObject } from './parse.js';
import { jsonResponse } from './responses.js';

const createChainSchema: BodySchema = {
  name: { type: 'string', required: true, nonEmpty: true, maxLength: 255 },
  description: { type: 'string', required: true, maxLength: 5000 },
  plugins: { type: 'array', required: true, items: 'object', maxItems: 50 },
  genre: { type: 'string', maxLength: 100 },
  instrument: { type: 'string', maxLength: 100 },
  tags: { type: 'array', items: 'string', maxItems: 30 },
  rating: { type: 'number', min: 0, max: 5 },
  createdBy: { type: 'string', maxLength: 100 },
};

export function createChainHandlers(container: Container) {
  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(createChainSchema)
  )(async (req) => {
    const chain = parseCreateChainRequest(await readJsonObject(req));
    await container.recommendationService.initialize();
    const id = await container.recommendationService.addChain(chain);

    const body: CreateChainResponse = {
      id,
      message: 'Plugin chain added successfully',
    };
    return jsonResponse(body, 201);
  });

  const search: Handler = pipeline(
    container.logging,
    errorHandler
  )(async (req) => {
    const params = new URL(req.url).searchParams;

    const hits = await container.recommendationService.searchChainsDirect(
      params.get('q') ?? '',
      {
        genre: params.get('genre') ?? undefined,
        instrument: params.get('instrument') ?? undefined,
      },
      parseLimit(params.get('limit'), DEFAULT_MAX_RESULTS, MAX_MAX_RESULTS)
    );

    const body: ChainSearchResponse = {
      results: hits.map(({ item, score }) => ({ chain: item, similarityScore: score })),
      total: hits.length,
    };
    return jsonResponse(body);
  });

  return { create, search };
}
