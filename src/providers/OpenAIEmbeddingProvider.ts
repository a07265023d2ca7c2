/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import { ProviderUnavailableError, describeError } from '../errors.js';
import { assertEmbeddable, assertEmbeddableBatch } from './embedding-input.js';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  readonly model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
  }

  async embed(text: string): Promise<number[]> {
    assertEmbeddable(text);
    const [vector] = await this.request([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    assertEmbeddableBatch(texts);
    return this.request(texts);
  }

  private async request(input: string[]): Promise<number[][]> {
    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
        dimensions: this.dimensions,
        encoding_format: 'float',
      });
      data = response.data;
    } catch (err) {
      throw new ProviderUnavailableError(
        'openai',
        `OpenAI embeddings request failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    if (data.length !== input.length) {
      throw new ProviderUnavailableError(
        'openai',
        `OpenAI returned ${data.length} embeddings for ${input.length} inputs`
      );
    }

    // Order by index so output lines up with input
    const vectors = [...data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);

    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new ProviderUnavailableError(
          'openai',
          `Expected ${this.dimensions}-dimensional embeddings, got ${vector.length}`
        );
      }
    }

    return vectors;
  }
}
