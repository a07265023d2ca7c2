/**
 * Embedding provider interface.
 * Turns text into fixed-dimensional vectors for similarity search.
 */

export interface IEmbeddingProvider {
  /** Model identifier, recorded for reproducible reindexing. */
  readonly model: string;
  /** Length of every vector this provider returns. */
  readonly dimensions: number;

  /**
   * Embed a single text.
   * Rejects empty text with InvalidInputError before contacting the upstream;
   * upstream failures surface as ProviderUnavailableError.
   */
  embed(text: string): Promise<number[]>;

  /** Embed many texts. One vector per input, in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}
