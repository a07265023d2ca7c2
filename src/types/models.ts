/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Catalog ──

export interface PluginSpec {
  name: string;
  manufacturer: string;
  /** EQ, compressor, reverb, saturation, ... */
  category: string;
  /** 1-based order within the chain. */
  position: number;
  settings?: string;
  parameters?: Record<string, unknown>;
}

/**
 * A curated plugin chain. Never mutated in place once stored; a revision is
 * a new insert.
 */
export interface PluginChain {
  /** Assigned by the store on creation. */
  id?: string;
  name: string;
  description: string;
  plugins: PluginSpec[];
  genre?: string;
  instrument?: string;
  tags: string[];
  /** Community rating, 0–5. */
  rating?: number;
  createdAt?: string;
  createdBy?: string;
}

export interface DocumentChunk {
  id?: string;
  content: string;
  /** Present on chunks read back from the index. */
  embedding?: number[];
  metadata: Record<string, unknown>;
  source: string;
  /** Position of this chunk within its source document. */
  chunkIndex: number;
  createdAt?: string;
}

// ── Retrieval ──

/**
 * An entity paired with its similarity to one query.
 * Scores are only comparable within a single result set.
 */
export interface SimilarityHit<T> {
  item: T;
  score: number;
}

export interface ChainFilters {
  genre?: string;
  instrument?: string;
}

// ── Recommendation ──

export interface RecommendationQuery {
  text: string;
  genre?: string;
  instrument?: string;
  /** Context for synthesis only; never used as a filter. */
  ownedPlugins?: string[];
  maxResults?: number;
}

export interface RecommendationResult {
  chain: PluginChain;
  similarityScore: number;
  /** Shared by every result of the same query. */
  explanation: string;
  confidence: number;
}

export interface ResponseEnvelope {
  recommendations: RecommendationResult[];
  queryContext: string;
  totalResults: number;
  searchTimeMs: number;
  tips: string | null;
}
