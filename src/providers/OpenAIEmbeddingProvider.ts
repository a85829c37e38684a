/**
 * OpenAI embedding provider (text-embedding-3-small).
 * The model can shorten its vectors; production asks for the size of the
 * pgvector column.
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { ProviderError } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  readonly dimensions: number;

  constructor(opts: {
    apiKey: string;
    model?: string;
    dimensions?: number;
  }) {
    this.client = new OpenAI({ apiKey: opts.apiKey });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [embedding] = await this.embed(text);
    return embedding;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.embed(texts);
  }

  private async embed(input: string | string[]): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
        dimensions: this.dimensions,
      });

      // OpenAI returns embeddings in the same order as input
      return response.data
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        throw new ProviderError(
          'openai',
          ProviderError.kindForStatus(err.status ?? 0),
          `OpenAI embeddings error (${err.status ?? 'network'}): ${err.message}`
        );
      }
      throw err;
    }
  }
}
