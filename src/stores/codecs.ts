/**
 * Payload codecs for the two collections.
 * Rows coming back from a store are decoded field by field; a missing or
 * mistyped required field fails loudly instead of defaulting.
 */

import { MalformedRecordError } from '../errors.js';
import type { DocumentChunkRow, PluginChainRow } from '../types/database.js';
import type { DocumentChunk, PluginChain, PluginSpec } from '../types/models.js';

export const CHAIN_COLLECTION = 'plugin_chains';
export const DOCUMENT_COLLECTION = 'document_chunks';

export const CHAIN_FILTER_KEYS = ['genre', 'instrument'] as const;

/** Chain fields stored as the index payload; id and timestamp live on the record. */
export type ChainPayload = Omit<PluginChain, 'id' | 'createdAt'>;
export type ChunkPayload = Omit<DocumentChunk, 'id' | 'createdAt' | 'embedding'>;

export type Fail = (message: string) => Error;

// ── Field readers ──

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireString(rec: UnknownRecord, key: string, fail: Fail): string {
  const value = rec[key];
  if (typeof value !== 'string') throw fail(`${key} must be a string`);
  return value;
}

export function optionalString(
  rec: UnknownRecord,
  key: string,
  fail: Fail
): string | undefined {
  const value = rec[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw fail(`${key} must be a string`);
  return value;
}

export function requireNumber(rec: UnknownRecord, key: string, fail: Fail): number {
  const value = rec[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(`${key} must be a number`);
  }
  return value;
}

export function optionalNumber(
  rec: UnknownRecord,
  key: string,
  fail: Fail
): number | undefined {
  const value = rec[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(`${key} must be a number`);
  }
  return value;
}

export function stringArray(rec: UnknownRecord, key: string, fail: Fail): string[] {
  const value = rec[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === 'string')) {
    throw fail(`${key} must be an array of strings`);
  }
  return [...value];
}

export function optionalObject(
  rec: UnknownRecord,
  key: string,
  fail: Fail
): UnknownRecord | undefined {
  const value = rec[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw fail(`${key} must be an object`);
  return value;
}

export function decodePluginSpec(value: unknown, fail: Fail): PluginSpec {
  if (!isRecord(value)) throw fail('plugin must be an object');
  const position = requireNumber(value, 'position', fail);
  if (!Number.isInteger(position) || position < 1) {
    throw fail('position must be a positive integer');
  }

  const settings = optionalString(value, 'settings', fail);
  const parameters = optionalObject(value, 'parameters', fail);

  return {
    name: requireString(value, 'name', fail),
    manufacturer: requireString(value, 'manufacturer', fail),
    category: requireString(value, 'category', fail),
    position,
    ...(settings !== undefined && { settings }),
    ...(parameters !== undefined && { parameters }),
  };
}

export function decodePlugins(value: unknown, fail: Fail): PluginSpec[] {
  if (!Array.isArray(value)) throw fail('plugins must be an array');
  return value.map((plugin) => decodePluginSpec(plugin, fail));
}

/** pgvector returns its text form, "[0.1,0.2,...]". */
export function decodeVector(value: unknown, fail: Fail): number[] {
  let parsed: unknown = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(value);
    } catch {
      throw fail('embedding is not a valid vector literal');
    }
  }
  if (!Array.isArray(parsed) || !parsed.every((v) => typeof v === 'number')) {
    throw fail('embedding must be an array of numbers');
  }
  return [...parsed];
}

// ── Plugin chains ──

export function chainPayloadToRow(
  payload: ChainPayload
): Omit<PluginChainRow, 'id' | 'embedding' | 'created_at'> {
  return {
    name: payload.name,
    description: payload.description,
    plugins: payload.plugins,
    genre: payload.genre ?? null,
    instrument: payload.instrument ?? null,
    tags: payload.tags,
    rating: payload.rating ?? null,
    created_by: payload.createdBy ?? null,
  };
}

export function rowToChainPayload(row: UnknownRecord): ChainPayload {
  const fail: Fail = (message) => new MalformedRecordError(CHAIN_COLLECTION, message);
  const genre = optionalString(row, 'genre', fail);
  const instrument = optionalString(row, 'instrument', fail);
  const rating = optionalNumber(row, 'rating', fail);
  const createdBy = optionalString(row, 'created_by', fail);

  return {
    name: requireString(row, 'name', fail),
    description: requireString(row, 'description', fail),
    plugins: decodePlugins(row.plugins, fail),
    tags: stringArray(row, 'tags', fail),
    ...(genre !== undefined && { genre }),
    ...(instrument !== undefined && { instrument }),
    ...(rating !== undefined && { rating }),
    ...(createdBy !== undefined && { createdBy }),
  };
}

export function chainCategories(payload: ChainPayload): Record<string, string | undefined> {
  return { genre: payload.genre, instrument: payload.instrument };
}

// ── Document chunks ──

export function chunkPayloadToRow(
  payload: ChunkPayload
): Omit<DocumentChunkRow, 'id' | 'embedding' | 'created_at'> {
  return {
    content: payload.content,
    metadata: payload.metadata,
    source: payload.source,
    chunk_index: payload.chunkIndex,
  };
}

export function rowToChunkPayload(row: UnknownRecord): ChunkPayload {
  const fail: Fail = (message) => new MalformedRecordError(DOCUMENT_COLLECTION, message);
  return {
    content: requireString(row, 'content', fail),
    metadata: optionalObject(row, 'metadata', fail) ?? {},
    source: requireString(row, 'source', fail),
    chunkIndex: requireNumber(row, 'chunk_index', fail),
  };
}
