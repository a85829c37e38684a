/**
 * Strategy documents: goals, policies and plans arranged in a three-level
 * hierarchy (top-level goal → sub-goal → measure).
 */

import type {
  IStrategyRepository,
  NewStrategyDocumentRow,
} from '../repositories/IStrategyRepository.js';
import type { StrategyDocumentRow } from '../types/database.js';
import type {
  CreateStrategyDocumentRequest,
  StrategyDocumentResponse,
  StrategyListFilters,
  StrategyStatsResponse,
  StrategyTreeNode,
  UpdateStrategyDocumentRequest,
} from '../types/api.js';
import { STRATEGY_DOCUMENT_TYPES } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { countBy } from './counting.js';

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 3;
const LEVELS = ['1', '2', '3'];

export interface StrategyDetailResponse extends StrategyDocumentResponse {
  children: StrategyDocumentResponse[];
}

export class StrategyService {
  constructor(private readonly strategyRepo: IStrategyRepository) {}

  async list(filters: StrategyListFilters): Promise<StrategyDocumentResponse[]> {
    const rows = await this.strategyRepo.list(filters);
    return rows.map(rowToStrategyResponse);
  }

  /**
   * Active documents nested under their parents. Documents whose parent is
   * missing or inactive are treated as roots.
   */
  async tree(): Promise<StrategyTreeNode[]> {
    const rows = await this.strategyRepo.list({ isActive: true });
    return buildTree(rows);
  }

  async getById(id: string): Promise<StrategyDetailResponse> {
    const row = await this.requireDocument(id);
    const children = await this.strategyRepo.findChildren(id);
    return { ...rowToStrategyResponse(row), children: children.map(rowToStrategyResponse) };
  }

  async create(input: CreateStrategyDocumentRequest): Promise<StrategyDocumentResponse> {
    const title = input.title.trim();
    if (!title) {
      throw new ValidationError('title must not be empty');
    }

    const parentId = input.parentId ?? null;
    if (parentId) {
      await this.requireParent(parentId);
    }

    const row: NewStrategyDocumentRow = {
      title,
      description: input.description ?? null,
      document_type: input.documentType,
      source: input.source ?? null,
      external_id: input.externalId ?? null,
      external_url: input.externalUrl ?? null,
      content: input.content ?? null,
      parent_id: parentId,
      level: checkLevel(input.level ?? MIN_LEVEL),
      sort_order: input.sortOrder ?? 0,
      responsible_department: input.responsibleDepartment ?? null,
      responsible_person: input.responsiblePerson ?? null,
      time_period: input.timePeriod ?? null,
      valid_from: input.validFrom ?? null,
      valid_to: input.validTo ?? null,
      is_active: input.isActive ?? true,
    };

    return rowToStrategyResponse(await this.strategyRepo.insert(row));
  }

  async update(
    id: string,
    input: UpdateStrategyDocumentRequest
  ): Promise<StrategyDocumentResponse> {
    await this.requireDocument(id);

    if (input.parentId !== undefined) {
      if (input.parentId === id) {
        throw new ValidationError('A strategy document cannot be its own parent');
      }
      await this.requireParent(input.parentId);
    }

    const data: Partial<StrategyDocumentRow> = {};
    if (input.title !== undefined) {
      const title = input.title.trim();
      if (!title) throw new ValidationError('title must not be empty');
      data.title = title;
    }
    if (input.description !== undefined) data.description = input.description;
    if (input.documentType !== undefined) data.document_type = input.documentType;
    if (input.source !== undefined) data.source = input.source;
    if (input.externalId !== undefined) data.external_id = input.externalId;
    if (input.externalUrl !== undefined) data.external_url = input.externalUrl;
    if (input.content !== undefined) data.content = input.content;
    if (input.parentId !== undefined) data.parent_id = input.parentId;
    if (input.level !== undefined) data.level = checkLevel(input.level);
    if (input.sortOrder !== undefined) data.sort_order = input.sortOrder;
    if (input.responsibleDepartment !== undefined)
      data.responsible_department = input.responsibleDepartment;
    if (input.responsiblePerson !== undefined) data.responsible_person = input.responsiblePerson;
    if (input.timePeriod !== undefined) data.time_period = input.timePeriod;
    if (input.validFrom !== undefined) data.valid_from = input.validFrom;
    if (input.validTo !== undefined) data.valid_to = input.validTo;
    if (input.isActive !== undefined) data.is_active = input.isActive;

    return rowToStrategyResponse(await this.strategyRepo.update(id, data));
  }

  /** Children survive as roots. */
  async delete(id: string): Promise<void> {
    await this.requireDocument(id);
    await this.strategyRepo.detachChildren(id);
    await this.strategyRepo.delete(id);
  }

  async stats(): Promise<StrategyStatsResponse> {
    const rows = await this.strategyRepo.list({});

    return {
      total: rows.length,
      byType: countBy(STRATEGY_DOCUMENT_TYPES, rows, (r) => r.document_type),
      byLevel: countBy(LEVELS, rows, (r) => String(r.level)),
      active: rows.filter((r) => r.is_active).length,
    };
  }

  // ── Private ──

  private async requireDocument(id: string): Promise<StrategyDocumentRow> {
    const row = await this.strategyRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Strategy document "${id}" not found`);
    }
    return row;
  }

  private async requireParent(parentId: string): Promise<void> {
    const parent = await this.strategyRepo.findById(parentId);
    if (!parent) {
      throw new ValidationError(`Parent strategy document "${parentId}" does not exist`);
    }
  }
}

function checkLevel(level: number): number {
  if (!Number.isInteger(level) || level < MIN_LEVEL || level > MAX_LEVEL) {
    throw new ValidationError(`level must be an integer from ${MIN_LEVEL} to ${MAX_LEVEL}`);
  }
  return level;
}

/** Nest rows by parent_id, keeping the repository's ordering among siblings. */
export function buildTree(rows: StrategyDocumentRow[]): StrategyTreeNode[] {
  const nodes = new Map<string, StrategyTreeNode>();
  for (const row of rows) {
    nodes.set(row.id, { ...rowToStrategyResponse(row), children: [] });
  }

  const roots: StrategyTreeNode[] = [];
  for (const row of rows) {
    const node = nodes.get(row.id);
    if (!node) continue;

    const parent = row.parent_id ? nodes.get(row.parent_id) : undefined;
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}

export function rowToStrategyResponse(row: StrategyDocumentRow): StrategyDocumentResponse {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    documentType: row.document_type,
    source: row.source,
    externalId: row.external_id,
    externalUrl: row.external_url,
    content: row.content,
    parentId: row.parent_id,
    level: row.level,
    sortOrder: row.sort_order,
    responsibleDepartment: row.responsible_department,
    responsiblePerson: row.responsible_person,
    timePeriod: row.time_period,
    validFrom: row.valid_from,
    validTo: row.valid_to,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
