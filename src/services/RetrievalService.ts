/**
 * Semantic retrieval over the chain catalog and the knowledge base.
 * Embeds query text, searches the matching index, and unpacks hits into
 * domain entities. Also owns ingestion, since both paths share the indexes.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { assertEmbeddable } from '../providers/embedding-input.js';
import type { ISimilarityIndex, IndexedRecord } from '../stores/ISimilarityIndex.js';
import type { ChainPayload, ChunkPayload } from '../stores/codecs.js';
import { assertLimit } from '../stores/ranking.js';
import { describeError } from '../errors.js';
import type {
  ChainFilters,
  DocumentChunk,
  PluginChain,
  SimilarityHit,
} from '../types/models.js';

export interface ChainSearchOptions extends ChainFilters {
  limit: number;
}

export interface BulkLoadResult {
  inserted: string[];
  failed: Array<{ name: string; error: string }>;
}

/**
 * Canonical text a chain is embedded from: name, description, tags, genre,
 * instrument, space-joined in that order. Tags are a set, so they are
 * de-duplicated and sorted; unset parts are skipped. Identical field values
 * always give an identical string.
 */
export function chainEmbeddingText(
  chain: Pick<PluginChain, 'name' | 'description' | 'tags' | 'genre' | 'instrument'>
): string {
  const tags = [...new Set(chain.tags.map((t) => t.trim()).filter(Boolean))].sort();
  return [chain.name, chain.description, tags.join(' '), chain.genre, chain.instrument]
    .map((part) => part?.trim())
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

export class RetrievalService {
  private initializing: Promise<void> | null = null;

  constructor(
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly chainIndex: ISimilarityIndex<ChainPayload>,
    private readonly knowledgeIndex: ISimilarityIndex<ChunkPayload>,
    private readonly logger: ILogProvider
  ) {}

  /**
   * Ensure both backing collections exist. Concurrent callers share the
   * attempt in flight; every later call checks the store again.
   */
  initialize(): Promise<void> {
    this.initializing ??= Promise.all([
      this.chainIndex.ensureCollection(),
      this.knowledgeIndex.ensureCollection(),
    ])
      .then(() => undefined)
      .finally(() => {
        this.initializing = null;
      });
    return this.initializing;
  }

  async searchChains(
    queryText: string,
    options: ChainSearchOptions
  ): Promise<Array<SimilarityHit<PluginChain>>> {
    assertEmbeddable(queryText, 'query text');
    assertLimit(options.limit);

    const vector = await this.embeddingProvider.embed(queryText);
    const hits = await this.chainIndex.query(vector, {
      limit: options.limit,
      filters: { genre: options.genre, instrument: options.instrument },
    });

    return hits.map(({ item, score }) => ({ item: toChain(item), score }));
  }

  async searchKnowledge(
    queryText: string,
    limit: number
  ): Promise<Array<SimilarityHit<DocumentChunk>>> {
    assertEmbeddable(queryText, 'query text');
    assertLimit(limit);

    const vector = await this.embeddingProvider.embed(queryText);
    const hits = await this.knowledgeIndex.query(vector, { limit });

    return hits.map(({ item, score }) => ({ item: toChunk(item), score }));
  }

  async addChain(chain: PluginChain): Promise<string> {
    const vector = await this.embeddingProvider.embed(chainEmbeddingText(chain));
    return this.chainIndex.upsert({ vector, payload: toChainPayload(chain) });
  }

  async addDocument(chunk: DocumentChunk): Promise<string> {
    const vector = await this.embeddingProvider.embed(chunk.content);
    return this.knowledgeIndex.upsert({ vector, payload: toChunkPayload(chunk) });
  }

  /**
   * Load a catalog. A chain that fails to insert is logged and skipped;
   * it never aborts the rest of the batch.
   */
  async addChains(chains: PluginChain[]): Promise<BulkLoadResult> {
    const result: BulkLoadResult = { inserted: [], failed: [] };

    for (const chain of chains) {
      try {
        result.inserted.push(await this.addChain(chain));
      } catch (err) {
        const error = describeError(err);
        result.failed.push({ name: chain.name, error });
        this.logger.warn('Skipping plugin chain that failed to load', {
          chain: chain.name,
          error,
        });
      }
    }

    this.logger.info('Plugin chains loaded', {
      inserted: result.inserted.length,
      failed: result.failed.length,
    });
    return result;
  }

  /**
   * Load knowledge-base chunks, embedding the valid ones in one batch.
   * Blank chunks and individual insert failures are logged and skipped;
   * an embedding failure aborts the load.
   */
  async addDocuments(chunks: DocumentChunk[]): Promise<BulkLoadResult> {
    const result: BulkLoadResult = { inserted: [], failed: [] };
    const embeddable: DocumentChunk[] = [];

    for (const chunk of chunks) {
      try {
        assertEmbeddable(chunk.content, 'content');
        embeddable.push(chunk);
      } catch (err) {
        this.skipChunk(result, chunk, err);
      }
    }

    const vectors =
      embeddable.length > 0
        ? await this.embeddingProvider.embedBatch(embeddable.map((chunk) => chunk.content))
        : [];

    for (const [i, chunk] of embeddable.entries()) {
      try {
        result.inserted.push(
          await this.knowledgeIndex.upsert({
            vector: vectors[i],
            payload: toChunkPayload(chunk),
          })
        );
      } catch (err) {
        this.skipChunk(result, chunk, err);
      }
    }

    this.logger.info('Document chunks loaded', {
      inserted: result.inserted.length,
      failed: result.failed.length,
    });
    return result;
  }

  // ── Private ──

  private skipChunk(result: BulkLoadResult, chunk: DocumentChunk, err: unknown): void {
    const name = `${chunk.source}#${chunk.chunkIndex}`;
    const error = describeError(err);
    result.failed.push({ name, error });
    this.logger.warn('Skipping document chunk that failed to load', {
      chunk: name,
      error,
    });
  }
}

// ── Mapping ──

function toChainPayload(chain: PluginChain): ChainPayload {
  const { id: _id, createdAt: _createdAt, ...payload } = chain;
  return payload;
}

function toChunkPayload(chunk: DocumentChunk): ChunkPayload {
  return {
    content: chunk.content,
    metadata: chunk.metadata,
    source: chunk.source,
    chunkIndex: chunk.chunkIndex,
  };
}

function toChain(record: IndexedRecord<ChainPayload>): PluginChain {
  return { ...record.payload, id: record.id, createdAt: record.createdAt };
}

function toChunk(record: IndexedRecord<ChunkPayload>): DocumentChunk {
  return {
    ...record.payload,
    id: record.id,
    embedding: record.vector,
    createdAt: record.createdAt,
  };
}
