import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createContainer } from '../../src/container.js';
import { HeuristicSynthesisProvider } from '../../src/providers/HeuristicSynthesisProvider.js';
import { ProviderUnavailableError } from '../../src/errors.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';
import type { RequestLogEvent } from '../../src/providers/ILogProvider.js';
import {
  compressionNote,
  createTestBackend,
  modernBassChain,
  vintageVocalChain,
  type TestBackend,
} from '../mocks/fixtures.js';

const BASE = 'http://localhost/api/v1';

describe('API Router', () => {
  let backend: TestBackend;
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;
  let seedDocument: () => Promise<string>;

  const ctx: HandlerContext = { requestId: 'req-test' };

  function post(path: string, body: unknown): Request {
    return new Request(`${BASE}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function get(path: string): Request {
    return new Request(`${BASE}${path}`, { method: 'GET' });
  }

  beforeEach(() => {
    backend = createTestBackend();
    let reading = 0;
    const container = createContainer({
      chainIndex: backend.chainIndex,
      knowledgeIndex: backend.knowledgeIndex,
      embeddingProvider: backend.embeddingProvider,
      synthesisProvider: new HeuristicSynthesisProvider(),
      logProvider: backend.logProvider,
      clock: () => (reading++ === 0 ? 100 : 142.5),
    });
    handle = createRouter(container).handle;
    seedDocument = () => container.retrievalService.addDocument(compressionNote);
  });

  // ── routing ──

  describe('routing', () => {
    it('should answer CORS preflight', async () => {
      const res = await handle(new Request(`${BASE}/query`, { method: 'OPTIONS' }), ctx);

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should return 404 for unknown paths', async () => {
      const res = await handle(get('/nope'), ctx);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/nope' },
      });
    });

    it('should return 405 with Allow for a known path and wrong method', async () => {
      const res = await handle(get('/query'), ctx);

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
    });

    it('should add CORS headers to handler responses', async () => {
      const res = await handle(post('/initialize', {}), ctx);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });
  });

  // ── system ──

  describe('system endpoints', () => {
    it('should create both collections on initialize', async () => {
      const res = await handle(post('/initialize', {}), ctx);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Collections initialized' });
      expect(backend.catalog.list()).toEqual(['document_chunks', 'plugin_chains']);
    });

    it('should report health', async () => {
      const res = await handle(get('/health'), ctx);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', database: 'connected' });
    });

    it('should report an outage that starts after a healthy check', async () => {
      expect((await handle(get('/health'), ctx)).status).toBe(200);

      backend.knowledgeIndex.ensureCollection = () =>
        Promise.reject(new ProviderUnavailableError('supabase', 'connection refused'));
      const res = await handle(get('/health'), ctx);

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        error: { code: 'PROVIDER_UNAVAILABLE', message: 'connection refused' },
      });
    });

    it('should log each request with its request id', async () => {
      await handle(get('/health'), ctx);

      const requestEvents = backend.logProvider.events.filter(
        (e): e is RequestLogEvent => 'method' in e
      );
      expect(requestEvents).toHaveLength(1);
      expect(requestEvents[0]).toMatchObject({
        level: 'info',
        method: 'GET',
        path: '/api/v1/health',
        status: 200,
        requestId: 'req-test',
      });
    });
  });

  // ── chains ──

  describe('POST /chains', () => {
    it('should add a chain and return its id', async () => {
      const res = await handle(post('/chains', vintageVocalChain), ctx);

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ id: 'id-001', message: 'Plugin chain added successfully' });
      expect(backend.chainIndex.get('id-001')?.payload.name).toBe('Vintage Vocal Chain');
    });

    it('should reject a body missing required fields', async () => {
      const res = await handle(post('/chains', { description: 'No name' }), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'INVALID_INPUT', message: 'name is required; plugins is required' },
      });
      expect(backend.chainIndex.size).toBe(0);
    });

    it('should reject a plugin with an invalid position', async () => {
      const res = await handle(
        post('/chains', {
          ...vintageVocalChain,
          plugins: [{ name: 'LA-2A', manufacturer: 'Universal Audio', category: 'compressor', position: 0 }],
        }),
        ctx
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_INPUT', message: 'position must be a positive integer' },
      });
    });

    it('should reject a rating above 5', async () => {
      const res = await handle(post('/chains', { ...vintageVocalChain, rating: 7 }), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { message: 'rating must be at most 5' },
      });
    });
  });

  describe('GET /chains/search', () => {
    beforeEach(async () => {
      await handle(post('/chains', vintageVocalChain), ctx);
      await handle(post('/chains', modernBassChain), ctx);
    });

    it('should return the closest chains with scores', async () => {
      const res = await handle(get('/chains/search?q=clean%20modern%20bass&limit=1'), ctx);

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        total: 1,
        results: [{ chain: { id: 'id-002', name: 'Modern Bass Chain' } }],
      });
    });

    it('should apply genre and instrument filters', async () => {
      const res = await handle(get('/chains/search?q=clean%20modern%20bass&instrument=Vocals'), ctx);

      expect(await res.json()).toMatchObject({
        total: 1,
        results: [{ chain: { name: 'Vintage Vocal Chain' } }],
      });
    });

    it('should reject a malformed limit', async () => {
      const res = await handle(get('/chains/search?q=bass&limit=abc'), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'INVALID_INPUT',
          message: 'limit must be a positive integer',
        },
      });
    });

    it('should reject a limit above 20', async () => {
      const res = await handle(get('/chains/search?q=bass&limit=21'), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'INVALID_INPUT', message: 'limit must be at most 20' },
      });
    });

    it('should reject a missing query', async () => {
      const res = await handle(get('/chains/search'), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { message: 'query text must not be empty' },
      });
    });
  });

  // ── query ──

  describe('POST /query', () => {
    it('should answer with SCHEMA_MISSING before initialization', async () => {
      const res = await handle(post('/query', { text: 'warm vocals' }), ctx);

      expect(res.status).toBe(503);
      expect(res.headers.get('Retry-After')).toBe('30');
      expect(await res.json()).toMatchObject({ error: { code: 'SCHEMA_MISSING' } });
    });

    it('should return the full recommendation envelope', async () => {
      await handle(post('/chains', vintageVocalChain), ctx);
      await handle(post('/chains', modernBassChain), ctx);
      await seedDocument();

      const res = await handle(
        post('/query', {
          text: 'warm vintage vocal chain for indie rock',
          ownedPlugins: ['LA-2A'],
        }),
        ctx
      );

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        queryContext: 'Query: warm vintage vocal chain for indie rock | Owned plugins: LA-2A',
        totalResults: 2,
        searchTimeMs: 42.5,
        tips: compressionNote.content,
        recommendations: [
          {
            chain: { id: 'id-001', name: 'Vintage Vocal Chain' },
            explanation:
              '"Vintage Vocal Chain" is the closest match for "warm vintage vocal chain for indie rock" ' +
              '(similarity 0.68). Shared tags: vintage, warm. You already own LA-2A. ' +
              '1 further chain(s) ranked below it.',
          },
          { chain: { id: 'id-002', name: 'Modern Bass Chain' } },
        ],
      });
    });

    it('should reject empty text', async () => {
      const res = await handle(post('/query', { text: '  ' }), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'INVALID_INPUT',
          message: 'text must not be empty',
          details: { fields: ['text must not be empty'] },
        },
      });
      expect(backend.embeddingProvider.callCount).toBe(0);
    });

    it('should reject maxResults above the cap', async () => {
      const res = await handle(post('/query', { text: 'bass', maxResults: 50 }), ctx);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { message: 'maxResults must be at most 20' },
      });
    });
  });
});
