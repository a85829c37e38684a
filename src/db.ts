/**
 * Supabase client factory.
 * Uses the service role key: the API is the only caller of the database and
 * enforces access itself.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
