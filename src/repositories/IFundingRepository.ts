/**
 * Funding call data access interface.
 */

import type { FundingCallRow } from '../types/database.js';
import type { FundingListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';

export type NewFundingCallRow = Omit<FundingCallRow, 'id' | 'created_at' | 'updated_at'>;

export interface IFundingRepository {
  insert(row: NewFundingCallRow): Promise<FundingCallRow>;

  findById(id: string): Promise<FundingCallRow | null>;

  /** Ordered by deadline, soonest first; calls without a deadline last. */
  list(filters: FundingListFilters, options: PaginationOptions): Promise<FundingCallRow[]>;

  count(filters?: FundingListFilters): Promise<number>;

  listAll(): Promise<FundingCallRow[]>;

  /** Calls not closed whose deadline falls within [from, to], soonest first. */
  findByDeadlineBetween(from: string, to: string): Promise<FundingCallRow[]>;

  update(id: string, data: Partial<FundingCallRow>): Promise<FundingCallRow>;

  delete(id: string): Promise<void>;
}
