/**
 * Embedding provider interface.
 * Wraps external embedding APIs (OpenAI, Voyage, etc).
 * Failures surface as ProviderError.
 */

export interface IEmbeddingProvider {
  /** Vector length produced by this provider. */
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** Embeddings in the same order as the input texts. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
