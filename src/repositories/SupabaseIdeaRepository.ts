/**
 * Supabase implementation of IIdeaRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IIdeaRepository } from './IIdeaRepository.js';
import type { IdeaRow, NewIdeaRow } from '../types/database.js';
import type { IdeaListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';
import type { AnalysisStatus } from '../types/models.js';
import { searchAcross } from './search.js';

export class SupabaseIdeaRepository implements IIdeaRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewIdeaRow): Promise<IdeaRow> {
    const { data, error } = await this.db
      .from('ideas')
      .insert({
        title: row.title,
        description: row.description,
        type: row.type,
        target_group: row.target_group,
        tags: row.tags,
        submitter_id: row.submitter_id,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert idea: ${error.message}`);
    return data as IdeaRow;
  }

  async findById(id: string): Promise<IdeaRow | null> {
    const { data, error } = await this.db
      .from('ideas')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find idea: ${error.message}`);
    return data as IdeaRow | null;
  }

  async findByIds(ids: string[]): Promise<IdeaRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db.from('ideas').select('*').in('id', ids);

    if (error) throw new Error(`Failed to find ideas: ${error.message}`);
    return (data ?? []) as IdeaRow[];
  }

  async list(filters: IdeaListFilters, options: PaginationOptions): Promise<IdeaRow[]> {
    const { data, error } = await this.filtered(filters, false)
      .order('created_at', { ascending: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list ideas: ${error.message}`);
    return (data ?? []) as IdeaRow[];
  }

  async count(filters: IdeaListFilters = {}): Promise<number> {
    const { count, error } = await this.filtered(filters, true);

    if (error) throw new Error(`Failed to count ideas: ${error.message}`);
    return count ?? 0;
  }

  async findByAnalysisStatus(status: AnalysisStatus): Promise<IdeaRow[]> {
    const { data, error } = await this.db
      .from('ideas')
      .select('*')
      .eq('analysis_status', status)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to find ideas by analysis status: ${error.message}`);
    return (data ?? []) as IdeaRow[];
  }

  async listIds(): Promise<string[]> {
    const { data, error } = await this.db
      .from('ideas')
      .select('id')
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list idea ids: ${error.message}`);
    return ((data ?? []) as Array<{ id: string }>).map((r) => r.id);
  }

  async update(id: string, data: Partial<IdeaRow>): Promise<IdeaRow> {
    const { data: updated, error } = await this.db
      .from('ideas')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update idea: ${error.message}`);
    return updated as IdeaRow;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('ideas').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete idea: ${error.message}`);
  }

  // ── Private ──

  private filtered(filters: IdeaListFilters, head: boolean) {
    let query = head
      ? this.db.from('ideas').select('*', { count: 'exact', head: true })
      : this.db.from('ideas').select('*');

    if (filters.status) query = query.eq('status', filters.status);
    if (filters.type) query = query.eq('type', filters.type);
    if (filters.priority) query = query.eq('priority', filters.priority);
    if (filters.targetGroup) query = query.eq('target_group', filters.targetGroup);
    if (filters.category) query = query.eq('category', filters.category);
    if (filters.tag) query = query.contains('tags', [filters.tag.toLowerCase()]);
    if (filters.search) query = query.or(searchAcross(['title', 'description'], filters.search));

    return query;
  }
}
