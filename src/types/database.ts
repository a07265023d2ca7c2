/**
 * Database row types — mirror the Supabase tables in supabase/migrations.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { PluginSpec } from './models.js';

export interface PluginChainRow {
  id: string;
  name: string;
  description: string;
  plugins: PluginSpec[]; // jsonb
  genre: string | null;
  instrument: string | null;
  tags: string[];
  rating: number | null;
  created_by: string | null;
  embedding: string; // pgvector serialized
  created_at: string;
}

export interface DocumentChunkRow {
  id: string;
  content: string;
  metadata: Record<string, unknown>; // jsonb
  source: string;
  chunk_index: number;
  embedding: string;
  created_at: string;
}
