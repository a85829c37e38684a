/**
 * Supabase implementation of IFundingRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IFundingRepository, NewFundingCallRow } from './IFundingRepository.js';
import type { FundingCallRow } from '../types/database.js';
import type { FundingListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';
import { searchAcross } from './search.js';

export class SupabaseFundingRepository implements IFundingRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewFundingCallRow): Promise<FundingCallRow> {
    const { data, error } = await this.db.from('funding_calls').insert(row).select().single();

    if (error) throw new Error(`Failed to insert funding call: ${error.message}`);
    return data as FundingCallRow;
  }

  async findById(id: string): Promise<FundingCallRow | null> {
    const { data, error } = await this.db
      .from('funding_calls')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find funding call: ${error.message}`);
    return data as FundingCallRow | null;
  }

  async list(filters: FundingListFilters, options: PaginationOptions): Promise<FundingCallRow[]> {
    const { data, error } = await this.filtered(filters, false)
      .order('deadline', { ascending: true, nullsFirst: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list funding calls: ${error.message}`);
    return (data ?? []) as FundingCallRow[];
  }

  async count(filters: FundingListFilters = {}): Promise<number> {
    const { count, error } = await this.filtered(filters, true);

    if (error) throw new Error(`Failed to count funding calls: ${error.message}`);
    return count ?? 0;
  }

  async listAll(): Promise<FundingCallRow[]> {
    const { data, error } = await this.db.from('funding_calls').select('*');

    if (error) throw new Error(`Failed to list funding calls: ${error.message}`);
    return (data ?? []) as FundingCallRow[];
  }

  async findByDeadlineBetween(from: string, to: string): Promise<FundingCallRow[]> {
    const { data, error } = await this.db
      .from('funding_calls')
      .select('*')
      .neq('status', 'closed')
      .gte('deadline', from)
      .lte('deadline', to)
      .order('deadline', { ascending: true });

    if (error) throw new Error(`Failed to find upcoming deadlines: ${error.message}`);
    return (data ?? []) as FundingCallRow[];
  }

  async update(id: string, data: Partial<FundingCallRow>): Promise<FundingCallRow> {
    const { data: updated, error } = await this.db
      .from('funding_calls')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update funding call: ${error.message}`);
    return updated as FundingCallRow;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('funding_calls').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete funding call: ${error.message}`);
  }

  // ── Private ──

  private filtered(filters: FundingListFilters, head: boolean) {
    let query = head
      ? this.db.from('funding_calls').select('*', { count: 'exact', head: true })
      : this.db.from('funding_calls').select('*');

    if (filters.source) query = query.eq('source', filters.source);
    if (filters.status) query = query.eq('status', filters.status);
    if (filters.search) query = query.or(searchAcross(['title', 'description'], filters.search));

    return query;
  }
}
