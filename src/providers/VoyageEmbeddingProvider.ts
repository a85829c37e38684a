/**
 * Voyage AI embeddings over plain fetch (the API has no official Node SDK).
 * Ideas and search queries are embedded as `query`, indexed documents as
 * `document`; Voyage tunes the vectors for retrieval in that direction.
 */

import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { ProviderError } from '../errors.js';

const API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-4-lite';
const DEFAULT_DIMENSIONS = 1024;

export type VoyageInputType = 'query' | 'document';

interface VoyageEmbedding {
  embedding: number[];
  index: number;
}

export interface VoyageEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Output size; omitted from requests when it is the model default. */
  dimensions?: number;
}

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  readonly dimensions: number;

  constructor(options: VoyageEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text], 'query');
    return embedding;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.embed(texts, 'document');
  }

  // ── Private ──

  private async embed(input: string[], inputType: VoyageInputType): Promise<number[][]> {
    const body: Record<string, unknown> = {
      input,
      model: this.model,
      input_type: inputType,
    };
    if (this.dimensions !== DEFAULT_DIMENSIONS) {
      body.output_dimension = this.dimensions;
    }

    let res: Response;
    try {
      res = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProviderError('voyage', 'unavailable', `Voyage API unreachable: ${reason}`);
    }

    if (!res.ok) {
      const payload: unknown = await res.json().catch(() => ({}));
      throw new ProviderError(
        'voyage',
        ProviderError.kindForStatus(res.status),
        `Voyage API error (${res.status}): ${errorDetail(payload)}`
      );
    }

    const embeddings = parseEmbeddings(await res.json());
    if (embeddings.length !== input.length) {
      throw new ProviderError(
        'voyage',
        'unavailable',
        `Voyage API returned ${embeddings.length} embeddings for ${input.length} inputs`
      );
    }

    // The API may answer out of order
    return embeddings.sort((a, b) => a.index - b.index).map((e) => e.embedding);
  }
}

function errorDetail(payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && 'detail' in payload) {
    return String(payload.detail);
  }
  return 'Unknown error';
}

function parseEmbeddings(payload: unknown): VoyageEmbedding[] {
  if (typeof payload !== 'object' || payload === null || !('data' in payload)) return [];
  const { data } = payload;
  if (!Array.isArray(data)) return [];

  const result: VoyageEmbedding[] = [];
  for (const item of data) {
    if (typeof item !== 'object' || item === null) continue;
    if (!('embedding' in item) || !('index' in item)) continue;
    const { embedding, index } = item;
    if (Array.isArray(embedding) && typeof index === 'number') {
      result.push({
        embedding: embedding.filter((v): v is number => typeof v === 'number'),
        index,
      });
    }
  }
  return result;
}
