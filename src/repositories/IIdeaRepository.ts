/**
 * Idea data access interface.
 */

import type { IdeaRow, NewIdeaRow } from '../types/database.js';
import type { IdeaListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';
import type { AnalysisStatus } from '../types/models.js';

export interface IIdeaRepository {
  insert(row: NewIdeaRow): Promise<IdeaRow>;

  findById(id: string): Promise<IdeaRow | null>;

  findByIds(ids: string[]): Promise<IdeaRow[]>;

  /** Newest first. */
  list(filters: IdeaListFilters, options: PaginationOptions): Promise<IdeaRow[]>;

  count(filters?: IdeaListFilters): Promise<number>;

  /** Every idea in the given analysis state, oldest first. */
  findByAnalysisStatus(status: AnalysisStatus): Promise<IdeaRow[]>;

  /** Every idea id, oldest first. */
  listIds(): Promise<string[]>;

  update(id: string, data: Partial<IdeaRow>): Promise<IdeaRow>;

  delete(id: string): Promise<void>;
}
