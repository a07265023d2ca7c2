/**
 * In-memory similarity index.
 * Exact cosine scan over a Map. Backs the test suites; production uses
 * SupabaseSimilarityIndex.
 */

import { randomUUID } from 'node:crypto';
import { SchemaMissingError } from '../errors.js';
import type { SimilarityHit } from '../types/models.js';
import type {
  ISimilarityIndex,
  IndexEntry,
  IndexQueryOptions,
  IndexedRecord,
} from './ISimilarityIndex.js';
import {
  activeFilters,
  assertLimit,
  assertVector,
  cosineSimilarity,
  matchesFilters,
  rankHits,
} from './ranking.js';

/**
 * Registry of the collections that exist. Shared by the indexes of one
 * in-memory "database" so ensureCollection can be checked from outside.
 */
export class InMemoryVectorCatalog {
  private readonly collections = new Set<string>();

  register(collection: string): void {
    this.collections.add(collection);
  }

  has(collection: string): boolean {
    return this.collections.has(collection);
  }

  list(): string[] {
    return [...this.collections].sort();
  }
}

type StoredRecord<P> = IndexedRecord<P> & { vector: number[] };

export interface InMemorySimilarityIndexOptions<P> {
  collection: string;
  dimensions: number;
  /** Keys accepted in query filters. */
  filterKeys?: readonly string[];
  /** Categorical values of a payload, looked up by filter key. */
  categoriesOf?: (payload: P) => Record<string, string | null | undefined>;
  catalog?: InMemoryVectorCatalog;
  generateId?: () => string;
  now?: () => Date;
}

export class InMemorySimilarityIndex<P> implements ISimilarityIndex<P> {
  readonly collection: string;
  readonly dimensions: number;
  /** Number of upsert/query calls that reached the store. */
  callCount = 0;

  private readonly entries = new Map<string, StoredRecord<P>>();
  private readonly filterKeys: readonly string[];
  private readonly categoriesOf: (payload: P) => Record<string, string | null | undefined>;
  private readonly catalog: InMemoryVectorCatalog;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: InMemorySimilarityIndexOptions<P>) {
    this.collection = options.collection;
    this.dimensions = options.dimensions;
    this.filterKeys = options.filterKeys ?? [];
    this.categoriesOf = options.categoriesOf ?? (() => ({}));
    this.catalog = options.catalog ?? new InMemoryVectorCatalog();
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  async ensureCollection(): Promise<void> {
    this.catalog.register(this.collection);
  }

  async upsert(entry: IndexEntry<P>): Promise<string> {
    assertVector(entry.vector, this.dimensions);
    this.assertCollection();
    this.callCount++;

    const id = entry.id ?? this.generateId();
    const existing = this.entries.get(id);

    this.entries.set(id, {
      id,
      vector: [...entry.vector],
      payload: structuredClone(entry.payload),
      createdAt: existing?.createdAt ?? this.now().toISOString(),
    });
    return id;
  }

  async query(
    vector: number[],
    options: IndexQueryOptions
  ): Promise<Array<SimilarityHit<IndexedRecord<P>>>> {
    assertLimit(options.limit);
    assertVector(vector, this.dimensions);
    const filters = activeFilters(options.filters, this.filterKeys);
    this.assertCollection();
    this.callCount++;

    // Filter first, then rank: top-K is taken from the narrowed set.
    const candidates = [...this.entries.values()].filter((record) =>
      matchesFilters(this.categoriesOf(record.payload), filters)
    );

    const ranked = rankHits(
      candidates.map((record) => ({
        item: record,
        score: cosineSimilarity(vector, record.vector),
      })),
      options.limit
    );

    // Hits are copies; callers never hold the stored record.
    return ranked.map(({ item, score }) => ({ item: structuredClone(item), score }));
  }

  // ── Test Helpers ──

  get size(): number {
    return this.entries.size;
  }

  get(id: string): IndexedRecord<P> | undefined {
    return this.entries.get(id);
  }

  // ── Private ──

  private assertCollection(): void {
    if (!this.catalog.has(this.collection)) {
      throw new SchemaMissingError(this.collection);
    }
  }
}
