/**
 * Vector index of document chunks.
 * Scores are cosine similarities; higher is closer.
 */

import type { DocumentChunkRow } from '../types/database.js';
import type { ChunkMetadata, ChunkSourceType } from '../types/models.js';

export interface IndexedChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

export interface ScoredChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface IndexQueryOptions {
  k: number;
  sourceType?: ChunkSourceType;
}

export type StoredChunk = Omit<DocumentChunkRow, 'embedding' | 'seq'>;

export interface IDocumentIndex {
  /** Insert or replace chunks by id. */
  upsert(chunks: IndexedChunk[]): Promise<void>;

  /** Nearest chunks, best first; equal scores keep insertion order. */
  query(embedding: number[], options: IndexQueryOptions): Promise<ScoredChunk[]>;

  /** Remove every chunk of a file. Returns how many were removed. */
  deleteBySource(filename: string): Promise<number>;

  /** Remove the chunks of a file whose chunkIndex is `fromIndex` or higher. */
  deleteChunksFrom(filename: string, fromIndex: number): Promise<number>;

  /** Remove everything. Returns how many chunks were removed. */
  clear(): Promise<number>;

  count(): Promise<number>;

  /** Every stored chunk without its vector, oldest first. */
  listChunks(): Promise<StoredChunk[]>;
}
