/**
 * Load the sample catalog and knowledge base into the configured backend.
 *
 * Usage: npm run load-sample-data
 * Requires the same environment as the API (see src/config.ts).
 */

import { readFile } from 'node:fs/promises';
import { getProductionContainer } from '../src/container.production.js';
import { parseCreateChainRequest } from '../src/api/parse.js';
import { InvalidInputError } from '../src/errors.js';
import {
  isRecord,
  optionalObject,
  requireNumber,
  requireString,
  type Fail,
} from '../src/stores/codecs.js';
import type { DocumentChunk, PluginChain } from '../src/types/models.js';

const invalid: Fail = (message) => new InvalidInputError(message);

async function readJsonArray(relativePath: string): Promise<unknown[]> {
  const text = await readFile(new URL(relativePath, import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) throw new Error(`${relativePath} must contain an array`);
  return parsed;
}

function toChain(value: unknown): PluginChain {
  if (!isRecord(value)) throw invalid('chain must be an object');
  return parseCreateChainRequest(value);
}

function toChunk(value: unknown): DocumentChunk {
  if (!isRecord(value)) throw invalid('chunk must be an object');
  return {
    content: requireString(value, 'content', invalid),
    metadata: optionalObject(value, 'metadata', invalid) ?? {},
    source: requireString(value, 'source', invalid),
    chunkIndex: requireNumber(value, 'chunkIndex', invalid),
  };
}

async function main(): Promise<void> {
  const container = getProductionContainer();
  const logger = container.logProvider;

  const chains = (await readJsonArray('../data/sample-chains.json')).map(toChain);
  const chunks = (await readJsonArray('../data/knowledge-base.json')).map(toChunk);

  await container.retrievalService.initialize();
  const chainResult = await container.retrievalService.addChains(chains);
  const chunkResult = await container.retrievalService.addDocuments(chunks);

  logger.info('Sample data loaded', {
    chains: chainResult.inserted.length,
    chunks: chunkResult.inserted.length,
    failures: chainResult.failed.length + chunkResult.failed.length,
  });
  await logger.flush();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
