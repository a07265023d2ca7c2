/**
 * Production container — Supabase pgvector + OpenAI.
 * Built once per process and shared by every request.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { createSupabaseClient } from './db.js';
import { SupabaseSimilarityIndex } from './stores/SupabaseSimilarityIndex.js';
import {
  CHAIN_COLLECTION,
  CHAIN_FILTER_KEYS,
  DOCUMENT_COLLECTION,
  chainPayloadToRow,
  chunkPayloadToRow,
  rowToChainPayload,
  rowToChunkPayload,
  type ChainPayload,
  type ChunkPayload,
} from './stores/codecs.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OpenAISynthesisProvider } from './providers/OpenAISynthesisProvider.js';
import { HeuristicSynthesisProvider } from './providers/HeuristicSynthesisProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ISynthesisProvider } from './providers/ISynthesisProvider.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;
  cached = buildContainer(loadConfig());
  return cached;
}

export function buildContainer(config: AppConfig): Container {
  const db = createSupabaseClient(config.supabase);
  const dimensions = config.embedding.dimensions;

  // Axiom when configured, console otherwise.
  const logProvider: ILogProvider = config.logging.axiom
    ? new AxiomLogProvider({
        ...config.logging.axiom,
        minLevel: config.logging.level,
        fields: { service: 'plugin-chain-rag' },
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.logging.level,
      });

  const synthesisProvider: ISynthesisProvider =
    config.synthesis.mode === 'heuristic'
      ? new HeuristicSynthesisProvider()
      : new OpenAISynthesisProvider({
          apiKey: config.openai.apiKey,
          model: config.synthesis.model,
        });

  return createContainer({
    chainIndex: new SupabaseSimilarityIndex<ChainPayload>(db, {
      table: CHAIN_COLLECTION,
      dimensions,
      filterKeys: CHAIN_FILTER_KEYS,
      toRow: chainPayloadToRow,
      fromRow: rowToChainPayload,
    }),
    knowledgeIndex: new SupabaseSimilarityIndex<ChunkPayload>(db, {
      table: DOCUMENT_COLLECTION,
      dimensions,
      toRow: chunkPayloadToRow,
      fromRow: rowToChunkPayload,
    }),
    embeddingProvider: new OpenAIEmbeddingProvider({
      apiKey: config.openai.apiKey,
      model: config.embedding.model,
      dimensions,
    }),
    synthesisProvider,
    logProvider,
    knowledgeResults: config.synthesis.knowledgeResults,
  });
}
