/**
 * Scoring and ordering rules shared by every ISimilarityIndex implementation.
 */

import { InvalidInputError } from '../errors.js';
import type { SimilarityHit } from '../types/models.js';
import type { CategoricalFilters } from './ISimilarityIndex.js';

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidInputError('limit must be a positive integer', { limit });
  }
}

/**
 * Reject vectors that cannot produce a defined cosine score: wrong length,
 * non-finite components, or zero magnitude.
 */
export function assertVector(vector: number[], dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new InvalidInputError(
      `vector must have ${dimensions} dimensions, got ${vector.length}`
    );
  }

  let sumSquares = 0;
  for (const v of vector) {
    if (!Number.isFinite(v)) {
      throw new InvalidInputError('vector contains a non-finite component');
    }
    sumSquares += v * v;
  }

  if (sumSquares === 0) {
    throw new InvalidInputError('vector has zero magnitude');
  }
}

/** Raw cosine similarity in [-1, 1]; NaN when either vector has no magnitude. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return Number.NaN;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Map a raw `1 - cosine_distance` value into [0, 1]. NaN scores become 0. */
export function toSimilarity(raw: number): number {
  if (Number.isNaN(raw)) return 0;
  return Math.min(1, Math.max(0, raw));
}

/**
 * Normalise the filter map to the set filters only, lower-cased.
 * Keys outside `allowedKeys` are an input error.
 */
export function activeFilters(
  filters: CategoricalFilters | undefined,
  allowedKeys: readonly string[]
): Array<[string, string]> {
  if (!filters) return [];

  const active: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(filters)) {
    if (!allowedKeys.includes(key)) {
      throw new InvalidInputError(`Unknown filter "${key}"`, {
        allowed: [...allowedKeys],
      });
    }
    if (value === undefined || value === null || value.trim() === '') continue;
    active.push([key, value.trim().toLowerCase()]);
  }
  return active;
}

/** Case-insensitive substring match of every active filter. */
export function matchesFilters(
  values: Record<string, string | null | undefined>,
  active: Array<[string, string]>
): boolean {
  return active.every(([key, needle]) => {
    const value = values[key];
    return typeof value === 'string' && value.toLowerCase().includes(needle);
  });
}

/**
 * Clamp scores, order by descending score with ties broken by ascending id,
 * and keep the first `limit`.
 */
export function rankHits<T extends { id: string }>(
  hits: Array<SimilarityHit<T>>,
  limit: number
): Array<SimilarityHit<T>> {
  return hits
    .map((hit) => ({ item: hit.item, score: toSimilarity(hit.score) }))
    .sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      return a.item.id < b.item.id ? -1 : a.item.id > b.item.id ? 1 : 0;
    })
    .slice(0, limit);
}
