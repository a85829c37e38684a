/**
 * Supabase implementation of IProjectRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IProjectRepository, NewProjectRow } from './IProjectRepository.js';
import type { ProjectIdeaRow, ProjectRow } from '../types/database.js';
import type { ProjectListFilters } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';
import { searchAcross } from './search.js';

export class SupabaseProjectRepository implements IProjectRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewProjectRow): Promise<ProjectRow> {
    const { data, error } = await this.db.from('projects').insert(row).select().single();

    if (error) throw new Error(`Failed to insert project: ${error.message}`);
    return data as ProjectRow;
  }

  async findById(id: string): Promise<ProjectRow | null> {
    const { data, error } = await this.db
      .from('projects')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find project: ${error.message}`);
    return data as ProjectRow | null;
  }

  async list(filters: ProjectListFilters, options: PaginationOptions): Promise<ProjectRow[]> {
    const { data, error } = await this.filtered(filters, false)
      .order('created_at', { ascending: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list projects: ${error.message}`);
    return (data ?? []) as ProjectRow[];
  }

  async count(filters: ProjectListFilters = {}): Promise<number> {
    const { count, error } = await this.filtered(filters, true);

    if (error) throw new Error(`Failed to count projects: ${error.message}`);
    return count ?? 0;
  }

  async listAll(): Promise<ProjectRow[]> {
    const { data, error } = await this.db
      .from('projects')
      .select('*')
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list projects: ${error.message}`);
    return (data ?? []) as ProjectRow[];
  }

  async update(id: string, data: Partial<ProjectRow>): Promise<ProjectRow> {
    const { data: updated, error } = await this.db
      .from('projects')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update project: ${error.message}`);
    return updated as ProjectRow;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('projects').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete project: ${error.message}`);
  }

  // ── Idea links ──

  async linkIdea(row: Omit<ProjectIdeaRow, 'created_at'>): Promise<ProjectIdeaRow> {
    const { data, error } = await this.db.from('project_ideas').insert(row).select().single();

    if (error) throw new Error(`Failed to link idea: ${error.message}`);
    return data as ProjectIdeaRow;
  }

  async findLink(projectId: string, ideaId: string): Promise<ProjectIdeaRow | null> {
    const { data, error } = await this.db
      .from('project_ideas')
      .select('*')
      .eq('project_id', projectId)
      .eq('idea_id', ideaId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find idea link: ${error.message}`);
    return data as ProjectIdeaRow | null;
  }

  async unlinkIdea(projectId: string, ideaId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('project_ideas')
      .delete({ count: 'exact' })
      .eq('project_id', projectId)
      .eq('idea_id', ideaId);

    if (error) throw new Error(`Failed to unlink idea: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async listLinks(projectId: string): Promise<ProjectIdeaRow[]> {
    const { data, error } = await this.db
      .from('project_ideas')
      .select('*')
      .eq('project_id', projectId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to list idea links: ${error.message}`);
    return (data ?? []) as ProjectIdeaRow[];
  }

  async countLinks(): Promise<number> {
    const { count, error } = await this.db
      .from('project_ideas')
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count idea links: ${error.message}`);
    return count ?? 0;
  }

  // ── Private ──

  private filtered(filters: ProjectListFilters, head: boolean) {
    let query = head
      ? this.db.from('projects').select('*', { count: 'exact', head: true })
      : this.db.from('projects').select('*');

    if (filters.status) query = query.eq('status', filters.status);
    if (filters.projectType) query = query.eq('project_type', filters.projectType);
    if (filters.department) query = query.eq('owner_department', filters.department);
    if (filters.search) query = query.or(searchAcross(['name', 'description'], filters.search));

    return query;
  }
}
