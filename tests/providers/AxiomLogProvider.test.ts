import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

/** Events sent in the nth fetch call. */
function sentBatch(call: number): Array<Record<string, unknown>> {
  return JSON.parse(String(mockFetch.mock.calls[call][1]?.body));
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'plugin-chains',
      flushIntervalMs: 0,
      flushThreshold: 3,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  // --- flush ---

  it('should post buffered events to the dataset ingest endpoint', async () => {
    provider.info('Plugin chains loaded', { inserted: 2 });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/plugin-chains/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(sentBatch(0)).toEqual([
      {
        level: 'info',
        message: 'Plugin chains loaded',
        fields: { inserted: 2 },
        timestamp: expect.any(String),
      },
    ]);
    expect(provider.pending).toBe(0);
  });

  it('should not call fetch with nothing buffered', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should share one request between concurrent flushes', async () => {
    provider.info('a');
    await Promise.all([provider.flush(), provider.flush()]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should flush by itself once the threshold is reached', async () => {
    provider.info('1');
    provider.info('2');
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('3');
    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
    expect(sentBatch(0).map((e) => e.message)).toEqual(['1', '2', '3']);
  });

  // --- failures ---

  it('should keep events after a rejected response and resend them', async () => {
    mockFetch.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));
    provider.error('Synthesis failed');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.pending).toBe(1);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBatch(1).map((e) => e.message)).toEqual(['Synthesis failed']);
    expect(provider.pending).toBe(0);
  });

  it('should report network errors on stderr and keep the batch', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.warn('retry me');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(stderr).toHaveBeenCalledWith('Axiom ingest failed: Network down');
    expect(provider.pending).toBe(1);
  });

  it('should drop the oldest events past maxBufferSize', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'plugin-chains',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 2,
    });
    capped.info('old');
    capped.info('middle');
    capped.info('new');
    expect(capped.pending).toBe(2);

    await capped.dispose();
    expect(sentBatch(0).map((e) => e.message)).toEqual(['middle', 'new']);
  });

  // --- levels and fields ---

  it('should apply minLevel and child fields before buffering', async () => {
    const filtered = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'plugin-chains',
      flushIntervalMs: 0,
      minLevel: 'info',
      fields: { service: 'plugin-chain-rag' },
    });
    filtered.debug('skipped');
    filtered.child({ component: 'retrieval' }).info('kept');

    await filtered.dispose();
    expect(sentBatch(0)).toEqual([
      {
        level: 'info',
        message: 'kept',
        fields: { service: 'plugin-chain-rag', component: 'retrieval' },
        timestamp: expect.any(String),
      },
    ]);
  });

  // --- disabled ---

  it('should do nothing without an API token', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'plugin-chains' });
    disabled.info('ignored');
    expect(disabled.pending).toBe(0);
    await disabled.dispose();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
