/**
 * Supabase implementation of ICommentRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ICommentRepository } from './ICommentRepository.js';
import type { CommentRow } from '../types/database.js';

export class SupabaseCommentRepository implements ICommentRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<CommentRow, 'id' | 'created_at'>): Promise<CommentRow> {
    const { data, error } = await this.db
      .from('comments')
      .insert({
        idea_id: row.idea_id,
        author_id: row.author_id,
        content: row.content,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert comment: ${error.message}`);
    return data as CommentRow;
  }

  async listByIdea(ideaId: string): Promise<CommentRow[]> {
    const { data, error } = await this.db
      .from('comments')
      .select('*')
      .eq('idea_id', ideaId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list comments: ${error.message}`);
    return (data ?? []) as CommentRow[];
  }
}
