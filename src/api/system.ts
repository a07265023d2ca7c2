/**
 * Operational endpoints.
 * GET  /api/v1/health      — verifies the backing collections
 * POST /api/v1/initialize  — ensures the backing collections exist
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { jsonResponse } from './responses.js';

export function createSystemHandlers(container: Container) {
  const health: Handler = pipeline(
    container.logging,
    errorHandler
  )(async () => {
    await container.recommendationService.initialize();
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      database: 'connected',
    };
    return jsonResponse(body);
  });

  const initialize: Handler = pipeline(
    container.logging,
    errorHandler
  )(async () => {
    await container.recommendationService.initialize();
    return jsonResponse({ message: 'Collections initialized' });
  });

  return { health, initialize };
}
