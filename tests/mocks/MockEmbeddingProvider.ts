/**
 * Mock embedding provider for testing.
 * Bag-of-words vectors: each lower-cased token is hashed into a bucket and
 * the counts are L2-normalised. Texts that share words score higher, so
 * ranking tests can reason about overlap instead of real model output.
 */

import type { IEmbeddingProvider } from '../../src/providers/IEmbeddingProvider.js';
import { assertEmbeddable, assertEmbeddableBatch } from '../../src/providers/embedding-input.js';

export class MockEmbeddingProvider implements IEmbeddingProvider {
  readonly model = 'mock-bag-of-words';
  readonly dimensions: number;
  public callCount = 0;
  /** When set, every call rejects with this error. */
  public failWith: Error | null = null;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    assertEmbeddable(text);
    this.callCount++;
    if (this.failWith) throw this.failWith;
    return this.textToVector(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    assertEmbeddableBatch(texts);
    this.callCount++;
    if (this.failWith) throw this.failWith;
    return texts.map((t) => this.textToVector(t));
  }

  // ── Test Helpers ──

  resetCallCount(): void {
    this.callCount = 0;
  }

  textToVector(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}
