/**
 * Shared test wiring: in-memory indexes over one catalog and sample chains.
 */

import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  InMemorySimilarityIndex,
  InMemoryVectorCatalog,
} from '../../src/stores/InMemorySimilarityIndex.js';
import {
  CHAIN_COLLECTION,
  CHAIN_FILTER_KEYS,
  DOCUMENT_COLLECTION,
  chainCategories,
  type ChainPayload,
  type ChunkPayload,
} from '../../src/stores/codecs.js';
import type { DocumentChunk, PluginChain } from '../../src/types/models.js';
import { MockEmbeddingProvider } from './MockEmbeddingProvider.js';

export interface TestBackend {
  catalog: InMemoryVectorCatalog;
  chainIndex: InMemorySimilarityIndex<ChainPayload>;
  knowledgeIndex: InMemorySimilarityIndex<ChunkPayload>;
  embeddingProvider: MockEmbeddingProvider;
  logProvider: ConsoleLogProvider;
}

export function createTestBackend(): TestBackend {
  const embeddingProvider = new MockEmbeddingProvider();
  const catalog = new InMemoryVectorCatalog();
  let nextId = 0;
  const generateId = () => `id-${String(++nextId).padStart(3, '0')}`;

  return {
    catalog,
    chainIndex: new InMemorySimilarityIndex<ChainPayload>({
      collection: CHAIN_COLLECTION,
      dimensions: embeddingProvider.dimensions,
      filterKeys: CHAIN_FILTER_KEYS,
      categoriesOf: chainCategories,
      catalog,
      generateId,
    }),
    knowledgeIndex: new InMemorySimilarityIndex<ChunkPayload>({
      collection: DOCUMENT_COLLECTION,
      dimensions: embeddingProvider.dimensions,
      catalog,
      generateId,
    }),
    embeddingProvider,
    logProvider: new ConsoleLogProvider(),
  };
}

export const vintageVocalChain: PluginChain = {
  name: 'Vintage Vocal Chain',
  description: 'Warm tube vocal path with gentle compression',
  plugins: [
    { name: 'LA-2A', manufacturer: 'Universal Audio', category: 'compressor', position: 2 },
    { name: 'Neve 1073', manufacturer: 'Universal Audio', category: 'preamp', position: 1 },
  ],
  genre: 'indie',
  instrument: 'vocals',
  tags: ['vintage', 'warm'],
};

export const modernBassChain: PluginChain = {
  name: 'Modern Bass Chain',
  description: 'Clean punchy low end for modern productions',
  plugins: [
    { name: 'Pro-Q 3', manufacturer: 'FabFilter', category: 'EQ', position: 1 },
    { name: 'Saturn 2', manufacturer: 'FabFilter', category: 'saturation', position: 2 },
  ],
  genre: 'electronic',
  instrument: 'bass',
  tags: ['modern', 'clean'],
};

export const compressionNote: DocumentChunk = {
  content: 'Optical compressors level vocals smoothly without audible pumping',
  metadata: { topic: 'compression' },
  source: 'Studio Notes: Dynamics',
  chunkIndex: 1,
};
