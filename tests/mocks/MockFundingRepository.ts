/**
 * In-memory mock for IFundingRepository.
 */

import type {
  IFundingRepository,
  NewFundingCallRow,
} from '../../src/repositories/IFundingRepository.js';
import type { FundingCallRow } from '../../src/types/database.js';
import type { FundingListFilters } from '../../src/types/api.js';
import type { PaginationOptions } from '../../src/types/common.js';
import { matchesSearch, nextTimestamp } from './clock.js';

export class MockFundingRepository implements IFundingRepository {
  private calls = new Map<string, FundingCallRow>();
  private nextId = 1;

  async insert(row: NewFundingCallRow): Promise<FundingCallRow> {
    const now = nextTimestamp();
    const full: FundingCallRow = {
      ...row,
      id: `funding-${this.nextId++}`,
      created_at: now,
      updated_at: now,
    };
    this.calls.set(full.id, full);
    return full;
  }

  async findById(id: string): Promise<FundingCallRow | null> {
    return this.calls.get(id) ?? null;
  }

  async list(filters: FundingListFilters, options: PaginationOptions): Promise<FundingCallRow[]> {
    return this.filtered(filters)
      .sort(byDeadline)
      .slice(options.offset, options.offset + options.limit);
  }

  async count(filters: FundingListFilters = {}): Promise<number> {
    return this.filtered(filters).length;
  }

  async listAll(): Promise<FundingCallRow[]> {
    return [...this.calls.values()];
  }

  async findByDeadlineBetween(from: string, to: string): Promise<FundingCallRow[]> {
    const start = Date.parse(from);
    const end = Date.parse(to);
    return [...this.calls.values()]
      .filter((c) => {
        if (!c.deadline || c.status === 'closed') return false;
        const deadline = Date.parse(c.deadline);
        return deadline >= start && deadline <= end;
      })
      .sort(byDeadline);
  }

  async update(id: string, data: Partial<FundingCallRow>): Promise<FundingCallRow> {
    const existing = this.calls.get(id);
    if (!existing) {
      throw new Error(`Funding call with id "${id}" not found`);
    }
    const updated: FundingCallRow = { ...existing, ...data, updated_at: nextTimestamp() };
    this.calls.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<void> {
    this.calls.delete(id);
  }

  private filtered(filters: FundingListFilters): FundingCallRow[] {
    return [...this.calls.values()].filter(
      (c) =>
        (!filters.source || c.source === filters.source) &&
        (!filters.status || c.status === filters.status) &&
        matchesSearch(filters.search, c.title, c.description)
    );
  }
}

function byDeadline(a: FundingCallRow, b: FundingCallRow): number {
  if (a.deadline === b.deadline) return 0;
  if (!a.deadline) return 1;
  if (!b.deadline) return -1;
  return Date.parse(a.deadline) - Date.parse(b.deadline);
}
