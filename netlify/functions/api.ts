/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 * The container is created once per cold start and shared across warm invocations.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

const router = createRouter(getProductionContainer());

export default async (req: Request, _context: Context) => {
  const requestId = req.headers.get('x-nf-request-id') ?? randomUUID();
  return router.handle(req, { requestId });
};

export const config = {
  path: '/api/v1/*',
};
