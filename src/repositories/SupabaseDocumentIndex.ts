/**
 * Supabase implementation of IDocumentIndex.
 * Uses pgvector for semantic similarity search.
 * Failures surface as ProviderError with provider `document_index`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  IDocumentIndex,
  IndexedChunk,
  IndexQueryOptions,
  ScoredChunk,
  StoredChunk,
} from './IDocumentIndex.js';
import type { ScoredChunkRow } from '../types/database.js';
import { ProviderError } from '../errors.js';

const UPSERT_BATCH = 100;
/** PostgREST caps a response at 1000 rows by default. */
const LIST_PAGE = 1000;

export class SupabaseDocumentIndex implements IDocumentIndex {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(chunks: IndexedChunk[]): Promise<void> {
    for (let i = 0; i < chunks.length; i += UPSERT_BATCH) {
      const batch = chunks.slice(i, i + UPSERT_BATCH).map((c) => ({
        id: c.id,
        content: c.content,
        metadata: c.metadata,
        embedding: JSON.stringify(c.embedding),
      }));

      const { error } = await this.db
        .from('document_chunks')
        .upsert(batch, { onConflict: 'id' });

      if (error) throw indexError(`Failed to upsert document chunks: ${error.message}`);
    }
  }

  /**
   * Vector similarity search using pgvector.
   * The RPC orders ties by `seq`, the insertion sequence.
   */
  async query(embedding: number[], options: IndexQueryOptions): Promise<ScoredChunk[]> {
    const { data, error } = await this.db.rpc('match_document_chunks', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.k,
      filter_source_type: options.sourceType ?? null,
    });

    if (error) throw indexError(`Failed to query document index: ${error.message}`);

    return ((data ?? []) as ScoredChunkRow[]).map((row) => ({
      id: row.id,
      content: row.content,
      metadata: row.metadata,
      score: row.similarity,
    }));
  }

  async deleteBySource(filename: string): Promise<number> {
    const { count, error } = await this.db
      .from('document_chunks')
      .delete({ count: 'exact' })
      .eq('metadata->>filename', filename);

    if (error) throw indexError(`Failed to delete document chunks: ${error.message}`);
    return count ?? 0;
  }

  async deleteChunksFrom(filename: string, fromIndex: number): Promise<number> {
    // `->` keeps chunkIndex as jsonb, so the comparison is numeric
    const { count, error } = await this.db
      .from('document_chunks')
      .delete({ count: 'exact' })
      .eq('metadata->>filename', filename)
      .gte('metadata->chunkIndex', fromIndex);

    if (error) throw indexError(`Failed to delete document chunks: ${error.message}`);
    return count ?? 0;
  }

  async clear(): Promise<number> {
    const { count, error } = await this.db
      .from('document_chunks')
      .delete({ count: 'exact' })
      .neq('id', '');

    if (error) throw indexError(`Failed to clear document index: ${error.message}`);
    return count ?? 0;
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from('document_chunks')
      .select('*', { count: 'exact', head: true });

    if (error) throw indexError(`Failed to count document chunks: ${error.message}`);
    return count ?? 0;
  }

  async listChunks(): Promise<StoredChunk[]> {
    const chunks: StoredChunk[] = [];

    for (let from = 0; ; from += LIST_PAGE) {
      const { data, error } = await this.db
        .from('document_chunks')
        .select('id, content, metadata, created_at')
        .order('seq', { ascending: true })
        .range(from, from + LIST_PAGE - 1);

      if (error) throw indexError(`Failed to list document chunks: ${error.message}`);

      const page = (data ?? []) as StoredChunk[];
      chunks.push(...page);
      if (page.length < LIST_PAGE) return chunks;
    }
  }
}

function indexError(message: string): ProviderError {
  return new ProviderError('document_index', 'unavailable', message);
}
