/**
 * Document index stub that answers every query with preset hits, so tests can
 * pin exact similarity scores. Records the options of the last query.
 */

import type {
  IDocumentIndex,
  IndexQueryOptions,
  ScoredChunk,
  StoredChunk,
} from '../../src/repositories/IDocumentIndex.js';
import type { ChunkMetadata } from '../../src/types/models.js';

export class FixedScoreIndex implements IDocumentIndex {
  public lastQuery: IndexQueryOptions | null = null;

  constructor(private readonly hits: ScoredChunk[]) {}

  async upsert(): Promise<void> {}

  async query(_embedding: number[], options: IndexQueryOptions): Promise<ScoredChunk[]> {
    this.lastQuery = options;
    return this.hits.slice(0, options.k);
  }

  async deleteBySource(): Promise<number> {
    return 0;
  }

  async deleteChunksFrom(): Promise<number> {
    return 0;
  }

  async clear(): Promise<number> {
    return 0;
  }

  async count(): Promise<number> {
    return this.hits.length;
  }

  async listChunks(): Promise<StoredChunk[]> {
    return [];
  }
}

/** A catalog hit for `serviceName` with the given score. */
export function serviceHit(
  serviceName: string,
  score: number,
  content = `Service: ${serviceName}`
): ScoredChunk {
  const metadata: ChunkMetadata = {
    filename: serviceName,
    fileType: 'service',
    sourceType: 'service_catalog',
    chunkIndex: 0,
    totalChunks: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
    serviceName,
    serviceType: 'municipal_service',
  };
  return { id: `${serviceName}#0`, content, metadata, score };
}
