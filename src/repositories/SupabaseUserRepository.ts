/**
 * Supabase implementation of IUserRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IUserRepository } from './IUserRepository.js';
import type { UserRow } from '../types/database.js';

export class SupabaseUserRepository implements IUserRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<UserRow, 'id' | 'created_at'>): Promise<UserRow> {
    const { data, error } = await this.db
      .from('users')
      .insert({
        name: row.name,
        email: row.email,
        department: row.department,
        role: row.role,
        api_key_hash: row.api_key_hash,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert user: ${error.message}`);
    return data as UserRow;
  }

  async findById(id: string): Promise<UserRow | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find user: ${error.message}`);
    return data as UserRow | null;
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('email', email.toLowerCase())
      .maybeSingle();

    if (error) throw new Error(`Failed to find user by email: ${error.message}`);
    return data as UserRow | null;
  }

  async findByApiKeyHash(hash: string): Promise<UserRow | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('api_key_hash', hash)
      .maybeSingle();

    if (error) throw new Error(`Failed to find user by key: ${error.message}`);
    return data as UserRow | null;
  }

  async findByIds(ids: string[]): Promise<UserRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db
      .from('users')
      .select('*')
      .in('id', ids);

    if (error) throw new Error(`Failed to find users: ${error.message}`);
    return (data ?? []) as UserRow[];
  }
}
