/**
 * Supabase implementation of IVoteRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IVoteRepository } from './IVoteRepository.js';
import type { VoteRow } from '../types/database.js';

export class SupabaseVoteRepository implements IVoteRepository {
  constructor(private readonly db: SupabaseClient) {}

  async find(ideaId: string, userId: string): Promise<VoteRow | null> {
    const { data, error } = await this.db
      .from('votes')
      .select('*')
      .eq('idea_id', ideaId)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find vote: ${error.message}`);
    return data as VoteRow | null;
  }

  async insert(ideaId: string, userId: string): Promise<VoteRow> {
    const { data, error } = await this.db
      .from('votes')
      .insert({ idea_id: ideaId, user_id: userId })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert vote: ${error.message}`);
    return data as VoteRow;
  }

  async delete(ideaId: string, userId: string): Promise<void> {
    const { error } = await this.db
      .from('votes')
      .delete()
      .eq('idea_id', ideaId)
      .eq('user_id', userId);

    if (error) throw new Error(`Failed to delete vote: ${error.message}`);
  }

  async countByIdea(ideaId: string): Promise<number> {
    const { count, error } = await this.db
      .from('votes')
      .select('*', { count: 'exact', head: true })
      .eq('idea_id', ideaId);

    if (error) throw new Error(`Failed to count votes: ${error.message}`);
    return count ?? 0;
  }

  async listIdeaIdsByUser(userId: string): Promise<string[]> {
    const { data, error } = await this.db
      .from('votes')
      .select('idea_id')
      .eq('user_id', userId)
      .order('created_at', { ascending: false });

    if (error) throw new Error(`Failed to list votes: ${error.message}`);
    return ((data ?? []) as Array<{ idea_id: string }>).map((r) => r.idea_id);
  }
}
