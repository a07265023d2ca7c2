/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createChainHandlers } from './chains.js';
import { createQueryHandlers } from './query.js';
import { createSystemHandlers } from './system.js';
import { jsonResponse } from './responses.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const chains = createChainHandlers(container);
  const query = createQueryHandlers(container);
  const system = createSystemHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/api\/v1\/query\/?$/, handler: query.submit },

    { method: 'GET', pattern: /^\/api\/v1\/chains\/search\/?$/, handler: chains.search },
    { method: 'POST', pattern: /^\/api\/v1\/chains\/?$/, handler: chains.create },

    { method: 'GET', pattern: /^\/api\/v1\/health\/?$/, handler: system.health },
    { method: 'POST', pattern: /^\/api\/v1\/initialize\/?$/, handler: system.initialize },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders() });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    const allowed = routes
      .filter((r) => r.pattern.test(url.pathname))
      .map((r) => r.method);

    if (allowed.length > 0) {
      return jsonResponse(
        { error: { code: 'METHOD_NOT_ALLOWED', message: `Method ${method} not allowed` } },
        405,
        { Allow: allowed.join(', '), ...corsHeaders() }
      );
    }

    return jsonResponse(
      { error: { code: 'NOT_FOUND', message: `No route matches ${method} ${url.pathname}` } },
      404,
      corsHeaders()
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
