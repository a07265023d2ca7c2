/**
 * Request payload decoding. Runs after validateBody, so these checks
 * only narrow types and enforce domain rules the schema cannot express.
 */

import { InvalidInputError } from '../errors.js';
import {
  decodePlugins,
  isRecord,
  optionalNumber,
  optionalString,
  requireString,
  stringArray,
  type Fail,
  type UnknownRecord,
} from '../stores/codecs.js';
import type { PluginChain, RecommendationQuery } from '../types/models.js';

const invalid: Fail = (message) => new InvalidInputError(message);

export async function readJsonObject(req: Request): Promise<UnknownRecord> {
  const body: unknown = await req.json();
  if (!isRecord(body)) throw invalid('Request body must be a JSON object');
  return body;
}

export function parseQueryRequest(body: UnknownRecord): RecommendationQuery {
  return {
    text: requireString(body, 'text', invalid),
    genre: optionalString(body, 'genre', invalid),
    instrument: optionalString(body, 'instrument', invalid),
    ownedPlugins: stringArray(body, 'ownedPlugins', invalid),
    maxResults: optionalNumber(body, 'maxResults', invalid),
  };
}

export function parseCreateChainRequest(body: UnknownRecord): PluginChain {
  const rating = optionalNumber(body, 'rating', invalid);
  if (rating !== undefined && (rating < 0 || rating > 5)) {
    throw invalid('rating must be between 0 and 5');
  }

  const genre = optionalString(body, 'genre', invalid);
  const instrument = optionalString(body, 'instrument', invalid);
  const createdBy = optionalString(body, 'createdBy', invalid);

  return {
    name: requireString(body, 'name', invalid),
    description: requireString(body, 'description', invalid),
    plugins: decodePlugins(body.plugins, invalid),
    tags: stringArray(body, 'tags', invalid),
    ...(genre !== undefined && { genre }),
    ...(instrument !== undefined && { instrument }),
    ...(rating !== undefined && { rating }),
    ...(createdBy !== undefined && { createdBy }),
  };
}

/** `limit` from a query string; absent means the default. */
export function parseLimit(raw: string | null, fallback: number, max: number): number {
  if (raw === null || raw === '') return fallback;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    throw invalid('limit must be a positive integer');
  }
  if (limit > max) throw invalid(`limit must be at most ${max}`);
  return limit;
}
