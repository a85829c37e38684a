/**
 * In-memory mock for IProjectRepository, idea links included.
 */

import type {
  IProjectRepository,
  NewProjectRow,
} from '../../src/repositories/IProjectRepository.js';
import type { ProjectIdeaRow, ProjectRow } from '../../src/types/database.js';
import type { ProjectListFilters } from '../../src/types/api.js';
import type { PaginationOptions } from '../../src/types/common.js';
import { matchesSearch, nextTimestamp } from './clock.js';

export class MockProjectRepository implements IProjectRepository {
  private projects = new Map<string, ProjectRow>();
  private links: ProjectIdeaRow[] = [];
  private nextId = 1;

  async insert(row: NewProjectRow): Promise<ProjectRow> {
    const now = nextTimestamp();
    const full: ProjectRow = { ...row, id: `project-${this.nextId++}`, created_at: now, updated_at: now };
    this.projects.set(full.id, full);
    return full;
  }

  async findById(id: string): Promise<ProjectRow | null> {
    return this.projects.get(id) ?? null;
  }

  async list(filters: ProjectListFilters, options: PaginationOptions): Promise<ProjectRow[]> {
    return this.filtered(filters)
      .reverse()
      .slice(options.offset, options.offset + options.limit);
  }

  async count(filters: ProjectListFilters = {}): Promise<number> {
    return this.filtered(filters).length;
  }

  async listAll(): Promise<ProjectRow[]> {
    return [...this.projects.values()];
  }

  async update(id: string, data: Partial<ProjectRow>): Promise<ProjectRow> {
    const existing = this.projects.get(id);
    if (!existing) {
      throw new Error(`Project with id "${id}" not found`);
    }
    const updated: ProjectRow = { ...existing, ...data, updated_at: nextTimestamp() };
    this.projects.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<void> {
    this.projects.delete(id);
    this.links = this.links.filter((l) => l.project_id !== id);
  }

  async linkIdea(row: Omit<ProjectIdeaRow, 'created_at'>): Promise<ProjectIdeaRow> {
    if (await this.findLink(row.project_id, row.idea_id)) {
      throw new Error('Duplicate project link');
    }
    const full: ProjectIdeaRow = { ...row, created_at: nextTimestamp() };
    this.links.push(full);
    return full;
  }

  async findLink(projectId: string, ideaId: string): Promise<ProjectIdeaRow | null> {
    return this.links.find((l) => l.project_id === projectId && l.idea_id === ideaId) ?? null;
  }

  async unlinkIdea(projectId: string, ideaId: string): Promise<boolean> {
    const before = this.links.length;
    this.links = this.links.filter((l) => !(l.project_id === projectId && l.idea_id === ideaId));
    return this.links.length < before;
  }

  async listLinks(projectId: string): Promise<ProjectIdeaRow[]> {
    return this.links.filter((l) => l.project_id === projectId);
  }

  async countLinks(): Promise<number> {
    return this.links.length;
  }

  private filtered(filters: ProjectListFilters): ProjectRow[] {
    return [...this.projects.values()].filter(
      (p) =>
        (!filters.status || p.status === filters.status) &&
        (!filters.projectType || p.project_type === filters.projectType) &&
        (!filters.department || p.owner_department === filters.department) &&
        matchesSearch(filters.search, p.name, p.description)
    );
  }
}
