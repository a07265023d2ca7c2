/**
 * Recommendation endpoint.
 * POST /api/v1/query — retrieval + synthesis
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { MAX_MAX_RESULTS } from '../services/RecommendationService.js';
import { parseQueryRequest, readJsonObject } from './parse.js';
import { jsonResponse } from './responses.js';

const querySchema: BodySchema = {
  text: { type: 'string', required: true, nonEmpty: true, maxLength: 2000 },
  genre: { type: 'string', maxLength: 100 },
  instrument: { type: 'string', maxLength: 100 },
  ownedPlugins: { type: 'array', items: 'string', maxItems: 200 },
  maxResults: { type: 'number', integer: true, min: 1, max: MAX_MAX_RESULTS },
};

export function createQueryHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(querySchema)
  )(async (req) => {
    const query = parseQueryRequest(await readJsonObject(req));
    const envelope = await container.recommendationService.submitQuery(query);
    return jsonResponse(envelope);
  });

  return { submit };
}
