/**
 * Supabase implementation of IStrategyRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IStrategyRepository, NewStrategyDocumentRow } from './IStrategyRepository.js';
import type { StrategyDocumentRow } from '../types/database.js';
import type { StrategyListFilters } from '../types/api.js';
import { searchAcross } from './search.js';

export class SupabaseStrategyRepository implements IStrategyRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewStrategyDocumentRow): Promise<StrategyDocumentRow> {
    const { data, error } = await this.db
      .from('strategy_documents')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert strategy document: ${error.message}`);
    return data as StrategyDocumentRow;
  }

  async findById(id: string): Promise<StrategyDocumentRow | null> {
    const { data, error } = await this.db
      .from('strategy_documents')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find strategy document: ${error.message}`);
    return data as StrategyDocumentRow | null;
  }

  async list(filters: StrategyListFilters): Promise<StrategyDocumentRow[]> {
    let query = this.db.from('strategy_documents').select('*');

    if (filters.documentType) query = query.eq('document_type', filters.documentType);
    if (filters.level !== undefined) query = query.eq('level', filters.level);
    if (filters.isActive !== undefined) query = query.eq('is_active', filters.isActive);
    if (filters.search) query = query.or(searchAcross(['title', 'description'], filters.search));

    const { data, error } = await query
      .order('level', { ascending: true })
      .order('sort_order', { ascending: true })
      .order('title', { ascending: true });

    if (error) throw new Error(`Failed to list strategy documents: ${error.message}`);
    return (data ?? []) as StrategyDocumentRow[];
  }

  async findChildren(parentId: string): Promise<StrategyDocumentRow[]> {
    const { data, error } = await this.db
      .from('strategy_documents')
      .select('*')
      .eq('parent_id', parentId)
      .order('sort_order', { ascending: true })
      .order('title', { ascending: true });

    if (error) throw new Error(`Failed to find child documents: ${error.message}`);
    return (data ?? []) as StrategyDocumentRow[];
  }

  async update(id: string, data: Partial<StrategyDocumentRow>): Promise<StrategyDocumentRow> {
    const { data: updated, error } = await this.db
      .from('strategy_documents')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update strategy document: ${error.message}`);
    return updated as StrategyDocumentRow;
  }

  async detachChildren(parentId: string): Promise<void> {
    const { error } = await this.db
      .from('strategy_documents')
      .update({ parent_id: null, updated_at: new Date().toISOString() })
      .eq('parent_id', parentId);

    if (error) throw new Error(`Failed to detach child documents: ${error.message}`);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('strategy_documents').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete strategy document: ${error.message}`);
  }
}
