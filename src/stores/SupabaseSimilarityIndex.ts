/**
 * Supabase implementation of ISimilarityIndex.
 * Uses pgvector: one table per collection plus a match_<table> RPC function
 * that filters, orders by cosine distance and limits
 * (see supabase/migrations/001_vector_collections.sql).
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import {
  MalformedRecordError,
  ProviderUnavailableError,
  SchemaMissingError,
} from '../errors.js';
import type { SimilarityHit } from '../types/models.js';
import type {
  ISimilarityIndex,
  IndexEntry,
  IndexQueryOptions,
  IndexedRecord,
} from './ISimilarityIndex.js';
import { decodeVector, isRecord, requireNumber, requireString } from './codecs.js';
import type { Fail, UnknownRecord } from './codecs.js';
import { activeFilters, assertLimit, assertVector, rankHits } from './ranking.js';

export interface SupabaseCollectionOptions<P> {
  table: string;
  dimensions: number;
  /** Defaults to `match_<table>`. */
  matchFunction?: string;
  /** Each key is passed to the match function as `filter_<key>`. */
  filterKeys?: readonly string[];
  toRow(payload: P): object;
  fromRow(row: UnknownRecord): P;
}

/** "relation does not exist" from Postgres, or a table/function unknown to PostgREST. */
const MISSING_RELATION_CODES = new Set(['42P01', '42883', 'PGRST202', 'PGRST205']);

export class SupabaseSimilarityIndex<P> implements ISimilarityIndex<P> {
  readonly collection: string;
  readonly dimensions: number;
  private readonly matchFunction: string;
  private readonly filterKeys: readonly string[];

  constructor(
    private readonly db: SupabaseClient,
    private readonly options: SupabaseCollectionOptions<P>
  ) {
    this.collection = options.table;
    this.dimensions = options.dimensions;
    this.matchFunction = options.matchFunction ?? `match_${options.table}`;
    this.filterKeys = options.filterKeys ?? [];
  }

  /**
   * Probe the table. Tables are created by the migration, not at runtime,
   * so a missing one is reported rather than created.
   */
  async ensureCollection(): Promise<void> {
    const { error } = await this.db
      .from(this.collection)
      .select('id', { count: 'exact', head: true });

    if (error) throw this.mapError(error, 'probe');
  }

  async upsert(entry: IndexEntry<P>): Promise<string> {
    assertVector(entry.vector, this.dimensions);

    const row = {
      ...this.options.toRow(entry.payload),
      embedding: JSON.stringify(entry.vector),
      ...(entry.id !== undefined && { id: entry.id }),
    };

    const { data, error } = await this.db
      .from(this.collection)
      .upsert(row)
      .select('id')
      .single();

    if (error) throw this.mapError(error, 'upsert into');

    const inserted: unknown = data;
    if (!isRecord(inserted)) throw this.fail('upsert returned no row');
    return requireString(inserted, 'id', this.fail);
  }

  async query(
    vector: number[],
    options: IndexQueryOptions
  ): Promise<Array<SimilarityHit<IndexedRecord<P>>>> {
    assertLimit(options.limit);
    assertVector(vector, this.dimensions);
    const active = new Map(activeFilters(options.filters, this.filterKeys));

    const params: Record<string, unknown> = {
      query_embedding: JSON.stringify(vector),
      match_count: options.limit,
    };
    for (const key of this.filterKeys) {
      params[`filter_${key}`] = active.get(key) ?? null;
    }

    const { data, error } = await this.db.rpc(this.matchFunction, params);
    if (error) throw this.mapError(error, 'search');

    const rows: unknown = data ?? [];
    if (!Array.isArray(rows)) throw this.fail(`${this.matchFunction} did not return rows`);

    const hits = rows.map((row: unknown) => this.decodeHit(row));
    return rankHits(hits, options.limit);
  }

  // ── Private ──

  private decodeHit(row: unknown): SimilarityHit<IndexedRecord<P>> {
    if (!isRecord(row)) throw this.fail('row must be an object');

    return {
      item: {
        id: requireString(row, 'id', this.fail),
        ...(row.embedding !== undefined && { vector: decodeVector(row.embedding, this.fail) }),
        payload: this.options.fromRow(row),
        createdAt: requireString(row, 'created_at', this.fail),
      },
      // A zero-magnitude stored vector yields NULL similarity; ranking clamps NaN to 0.
      score: row.similarity === null ? Number.NaN : requireNumber(row, 'similarity', this.fail),
    };
  }

  private readonly fail: Fail = (message) =>
    new MalformedRecordError(this.collection, message);

  private mapError(error: PostgrestError, action: string): Error {
    if (MISSING_RELATION_CODES.has(error.code)) {
      return new SchemaMissingError(this.collection, { cause: error });
    }
    return new ProviderUnavailableError(
      'supabase',
      `Failed to ${action} ${this.collection}: ${error.message}`,
      { cause: error }
    );
  }
}
