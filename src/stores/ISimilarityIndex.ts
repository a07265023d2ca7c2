/**
 * Similarity index interface.
 * Stores (id, vector, payload) entries in one named collection and answers
 * nearest-neighbour queries by cosine distance.
 */

import type { SimilarityHit } from '../types/models.js';

/**
 * Categorical filters. A key whose value is unset, null or empty applies
 * no restriction.
 */
export type CategoricalFilters = Record<string, string | null | undefined>;

export interface IndexEntry<P> {
  /** Omit to let the store assign one. */
  id?: string;
  vector: number[];
  payload: P;
}

export interface IndexedRecord<P> {
  id: string;
  /** Absent when the store does not return embeddings for the collection. */
  vector?: number[];
  payload: P;
  createdAt: string;
}

export interface IndexQueryOptions {
  /** Maximum number of hits. Must be a positive integer. */
  limit: number;
  /** Applied before ranking, so the top `limit` come from the filtered set. */
  filters?: CategoricalFilters;
}

export interface ISimilarityIndex<P> {
  readonly collection: string;
  readonly dimensions: number;

  /**
   * Make sure the backing collection exists. Idempotent; throws
   * SchemaMissingError when the collection is absent and cannot be created.
   */
  ensureCollection(): Promise<void>;

  /** Store or replace an entry. Resolves with its id. */
  upsert(entry: IndexEntry<P>): Promise<string>;

  /**
   * Up to `limit` hits ordered by descending similarity (ties by id),
   * each scored in [0, 1].
   */
  query(
    vector: number[],
    options: IndexQueryOptions
  ): Promise<Array<SimilarityHit<IndexedRecord<P>>>>;
}
