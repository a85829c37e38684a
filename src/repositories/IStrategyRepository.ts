/**
 * Strategy document data access interface.
 */

import type { StrategyDocumentRow } from '../types/database.js';
import type { StrategyListFilters } from '../types/api.js';

export type NewStrategyDocumentRow = Omit<StrategyDocumentRow, 'id' | 'created_at' | 'updated_at'>;

export interface IStrategyRepository {
  insert(row: NewStrategyDocumentRow): Promise<StrategyDocumentRow>;

  findById(id: string): Promise<StrategyDocumentRow | null>;

  /** Ordered by level, then sort order, then title. */
  list(filters: StrategyListFilters): Promise<StrategyDocumentRow[]>;

  findChildren(parentId: string): Promise<StrategyDocumentRow[]>;

  update(id: string, data: Partial<StrategyDocumentRow>): Promise<StrategyDocumentRow>;

  /** Clear parent_id on every child of the given document. */
  detachChildren(parentId: string): Promise<void>;

  delete(id: string): Promise<void>;
}
