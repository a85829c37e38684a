/**
 * User data access interface.
 */

import type { UserRow } from '../types/database.js';

export interface IUserRepository {
  insert(row: Omit<UserRow, 'id' | 'created_at'>): Promise<UserRow>;

  findById(id: string): Promise<UserRow | null>;

  /** Lookup by lower-cased email. */
  findByEmail(email: string): Promise<UserRow | null>;

  findByApiKeyHash(hash: string): Promise<UserRow | null>;

  findByIds(ids: string[]): Promise<UserRow[]>;
}
