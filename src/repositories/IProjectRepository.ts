/**
 * Project data access interface, including idea links.
 */

import type { ProjectIdeaRow, ProjectRow } from '../types/database.js';
import type { ProjectListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';

export type NewProjectRow = Omit<ProjectRow, 'id' | 'created_at' | 'updated_at'>;

export interface IProjectRepository {
  insert(row: NewProjectRow): Promise<ProjectRow>;

  findById(id: string): Promise<ProjectRow | null>;

  list(filters: ProjectListFilters, options: PaginationOptions): Promise<ProjectRow[]>;

  count(filters?: ProjectListFilters): Promise<number>;

  listAll(): Promise<ProjectRow[]>;

  update(id: string, data: Partial<ProjectRow>): Promise<ProjectRow>;

  delete(id: string): Promise<void>;

  // ── Idea links ──

  linkIdea(row: Omit<ProjectIdeaRow, 'created_at'>): Promise<ProjectIdeaRow>;

  findLink(projectId: string, ideaId: string): Promise<ProjectIdeaRow | null>;

  /** Returns false when no such link existed. */
  unlinkIdea(projectId: string, ideaId: string): Promise<boolean>;

  listLinks(projectId: string): Promise<ProjectIdeaRow[]>;

  countLinks(): Promise<number>;
}
