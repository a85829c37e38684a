/**
 * Projects and the ideas they implement, extend or were inspired by.
 */

import type { IProjectRepository, NewProjectRow } from '../repositories/IProjectRepository.js';
import type { IIdeaRepository } from '../repositories/IIdeaRepository.js';
import type { ProjectIdeaRow, ProjectRow } from '../types/database.js';
import type {
  CreateProjectRequest,
  LinkIdeaRequest,
  LinkedIdeaResponse,
  ProjectDetailResponse,
  ProjectListFilters,
  ProjectResponse,
  ProjectStatsResponse,
  UpdateProjectRequest,
} from '../types/api.js';
import type { PaginatedResult, PaginationOptions } from '../types/common.js';
import { PROJECT_STATUSES, PROJECT_TYPES } from '../types/models.js';
import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import { countBy } from './counting.js';

export class ProjectService {
  constructor(
    private readonly projectRepo: IProjectRepository,
    private readonly ideaRepo: IIdeaRepository
  ) {}

  async list(
    filters: ProjectListFilters,
    pagination: PaginationOptions
  ): Promise<PaginatedResult<ProjectResponse>> {
    const [rows, total] = await Promise.all([
      this.projectRepo.list(filters, pagination),
      this.projectRepo.count(filters),
    ]);

    return {
      data: rows.map(rowToProjectResponse),
      total,
      limit: pagination.limit,
      offset: pagination.offset,
    };
  }

  async getById(id: string): Promise<ProjectDetailResponse> {
    const row = await this.requireProject(id);
    return { ...rowToProjectResponse(row), linkedIdeas: await this.linkedIdeas(id) };
  }

  async create(input: CreateProjectRequest): Promise<ProjectDetailResponse> {
    const ideaIds = [...new Set(input.ideaIds ?? [])];
    if (ideaIds.length > 0) {
      const found = await this.ideaRepo.findByIds(ideaIds);
      const missing = ideaIds.filter((id) => !found.some((idea) => idea.id === id));
      if (missing.length > 0) {
        throw new ValidationError('Some ideas do not exist', { missingIdeaIds: missing });
      }
    }

    const row = await this.projectRepo.insert(toNewRow(input));

    for (const ideaId of ideaIds) {
      await this.projectRepo.linkIdea({
        project_id: row.id,
        idea_id: ideaId,
        relationship_type: 'implements',
        notes: null,
      });
    }

    return this.getById(row.id);
  }

  async update(id: string, input: UpdateProjectRequest): Promise<ProjectResponse> {
    const current = await this.requireProject(id);
    const data = toRowPatch(input);
    checkDates(data.planned_start ?? current.planned_start, data.planned_end ?? current.planned_end);

    const updated = await this.projectRepo.update(id, data);
    return rowToProjectResponse(updated);
  }

  async delete(id: string): Promise<void> {
    await this.requireProject(id);
    await this.projectRepo.delete(id);
  }

  async linkIdea(projectId: string, input: LinkIdeaRequest): Promise<LinkedIdeaResponse> {
    await this.requireProject(projectId);

    const idea = await this.ideaRepo.findById(input.ideaId);
    if (!idea) {
      throw new NotFoundError(`Idea "${input.ideaId}" not found`);
    }

    const existing = await this.projectRepo.findLink(projectId, input.ideaId);
    if (existing) {
      throw new ConflictError(`Idea "${input.ideaId}" is already linked to this project`);
    }

    const link = await this.projectRepo.linkIdea({
      project_id: projectId,
      idea_id: input.ideaId,
      relationship_type: input.relationshipType ?? 'implements',
      notes: input.notes?.trim() || null,
    });

    return toLinkedIdea(link, idea.title, idea.status);
  }

  async unlinkIdea(projectId: string, ideaId: string): Promise<void> {
    await this.requireProject(projectId);

    const removed = await this.projectRepo.unlinkIdea(projectId, ideaId);
    if (!removed) {
      throw new NotFoundError(`Idea "${ideaId}" is not linked to this project`);
    }
  }

  async stats(): Promise<ProjectStatsResponse> {
    const [projects, linkedIdeas] = await Promise.all([
      this.projectRepo.listAll(),
      this.projectRepo.countLinks(),
    ]);

    return {
      total: projects.length,
      byStatus: countBy(PROJECT_STATUSES, projects, (p) => p.status),
      byType: countBy(PROJECT_TYPES, projects, (p) => p.project_type),
      totalBudget: projects.reduce((sum, p) => sum + (p.estimated_budget ?? 0), 0),
      linkedIdeas,
    };
  }

  // ── Private ──

  private async requireProject(id: string): Promise<ProjectRow> {
    const row = await this.projectRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Project "${id}" not found`);
    }
    return row;
  }

  private async linkedIdeas(projectId: string): Promise<LinkedIdeaResponse[]> {
    const links = await this.projectRepo.listLinks(projectId);
    const ideas = await this.ideaRepo.findByIds(links.map((l) => l.idea_id));
    const byId = new Map(ideas.map((i) => [i.id, i]));

    return links.map((link) => {
      const idea = byId.get(link.idea_id);
      return toLinkedIdea(link, idea?.title ?? null, idea?.status ?? null);
    });
  }
}

// ── Mapping ──

function toNewRow(input: CreateProjectRequest): NewProjectRow {
  const row: NewProjectRow = {
    name: input.name.trim(),
    description: input.description.trim(),
    status: input.status ?? 'proposed',
    project_type: input.projectType ?? 'internal',
    planned_start: input.plannedStart ?? null,
    planned_end: input.plannedEnd ?? null,
    actual_start: input.actualStart ?? null,
    actual_end: input.actualEnd ?? null,
    estimated_budget: input.estimatedBudget ?? null,
    funding_source: input.fundingSource ?? null,
    owner_department: input.ownerDepartment ?? null,
    contact_email: input.contactEmail ?? null,
    project_manager: input.projectManager ?? null,
  };
  checkDates(row.planned_start, row.planned_end);
  return row;
}

function toRowPatch(input: UpdateProjectRequest): Partial<ProjectRow> {
  const data: Partial<ProjectRow> = {};
  if (input.name !== undefined) data.name = input.name.trim();
  if (input.description !== undefined) data.description = input.description.trim();
  if (input.status !== undefined) data.status = input.status;
  if (input.projectType !== undefined) data.project_type = input.projectType;
  if (input.plannedStart !== undefined) data.planned_start = input.plannedStart;
  if (input.plannedEnd !== undefined) data.planned_end = input.plannedEnd;
  if (input.actualStart !== undefined) data.actual_start = input.actualStart;
  if (input.actualEnd !== undefined) data.actual_end = input.actualEnd;
  if (input.estimatedBudget !== undefined) data.estimated_budget = input.estimatedBudget;
  if (input.fundingSource !== undefined) data.funding_source = input.fundingSource;
  if (input.ownerDepartment !== undefined) data.owner_department = input.ownerDepartment;
  if (input.contactEmail !== undefined) data.contact_email = input.contactEmail;
  if (input.projectManager !== undefined) data.project_manager = input.projectManager;
  return data;
}

function checkDates(start: string | null, end: string | null): void {
  if (start && end && Date.parse(end) < Date.parse(start)) {
    throw new ValidationError('plannedEnd must not be before plannedStart');
  }
}

export function rowToProjectResponse(row: ProjectRow): ProjectResponse {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    status: row.status,
    projectType: row.project_type,
    plannedStart: row.planned_start,
    plannedEnd: row.planned_end,
    actualStart: row.actual_start,
    actualEnd: row.actual_end,
    estimatedBudget: row.estimated_budget,
    fundingSource: row.funding_source,
    ownerDepartment: row.owner_department,
    contactEmail: row.contact_email,
    projectManager: row.project_manager,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toLinkedIdea(
  link: ProjectIdeaRow,
  title: string | null,
  status: LinkedIdeaResponse['status']
): LinkedIdeaResponse {
  return {
    ideaId: link.idea_id,
    title,
    status,
    relationshipType: link.relationship_type,
    notes: link.notes,
    linkedAt: link.created_at,
  };
}
