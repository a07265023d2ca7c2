/**
 * API types — shapes for response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { PluginChain } from './models.js';

export interface CreateChainResponse {
  id: string;
  message: string;
}

export interface ChainSearchResult {
  chain: PluginChain;
  similarityScore: number;
}

export interface ChainSearchResponse {
  results: ChainSearchResult[];
  total: number;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  database: 'connected';
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
