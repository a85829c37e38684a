/**
 * Idea lifecycle: submission, editing, status changes, deletion and the AI
 * analysis that runs on every new idea.
 *
 * A provider failure during analysis never loses the idea: it is stored with
 * analysis status `failed` and the error text, AI fields untouched.
 */

import type { IIdeaRepository } from '../repositories/IIdeaRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IdeaRow } from '../types/database.js';
import type { AnalysisOutcome, IdeaStatus, User } from '../types/models.js';
import { IDEA_STATUSES, IDEA_TYPES } from '../types/models.js';
import type {
  CreateIdeaRequest,
  GapReport,
  IdeaDetailResponse,
  IdeaListFilters,
  IdeaResponse,
  IdeaStatsResponse,
  ReanalyzeResponse,
  UpdateIdeaRequest,
} from '../types/api.js';
import type { PaginatedResult, PaginationOptions } from '../types/common.js';
import type { AnalysisService } from './AnalysisService.js';
import type { CommentService } from './CommentService.js';
import type { GapAnalyzer } from './GapAnalyzer.js';
import { ContentScanner } from './ContentScanner.js';
import { zipCounts } from './counting.js';
import {
  AnalysisFailedError,
  ForbiddenError,
  NotFoundError,
  ProviderError,
  ValidationError,
} from '../errors.js';

export const TITLE_MIN = 5;
export const TITLE_MAX = 200;
export const DESCRIPTION_MIN = 10;
export const DESCRIPTION_MAX = 5000;
export const MAX_TAGS = 20;
const MAX_TAG_LENGTH = 50;
const RECENT_IDEAS = 5;

export interface IdeaServiceDeps {
  ideaRepo: IIdeaRepository;
  analysisService: AnalysisService;
  commentService: CommentService;
  gapAnalyzer: GapAnalyzer;
  logProvider: ILogProvider;
}

export class IdeaService {
  private readonly scanner = new ContentScanner();

  constructor(private readonly deps: IdeaServiceDeps) {}

  async create(input: CreateIdeaRequest, user: User): Promise<IdeaResponse> {
    const title = input.title.trim();
    const description = input.description.trim();
    this.validateText(title, description);
    this.scan(title, description);

    const row = await this.deps.ideaRepo.insert({
      title,
      description,
      type: input.type,
      target_group: input.targetGroup,
      tags: normalizeTags(input.tags ?? []),
      submitter_id: user.id,
    });

    this.deps.logProvider.info('Idea submitted', { ideaId: row.id, userId: user.id });

    const result = await this.runAnalysis(row);
    return rowToIdeaResponse(result.row);
  }

  async getById(id: string): Promise<IdeaDetailResponse> {
    const row = await this.requireIdea(id);
    const comments = await this.deps.commentService.list(id);
    return { ...rowToIdeaResponse(row), comments };
  }

  async list(
    filters: IdeaListFilters,
    pagination: PaginationOptions
  ): Promise<PaginatedResult<IdeaResponse>> {
    const [rows, total] = await Promise.all([
      this.deps.ideaRepo.list(filters, pagination),
      this.deps.ideaRepo.count(filters),
    ]);

    return {
      data: rows.map(rowToIdeaResponse),
      total,
      limit: pagination.limit,
      offset: pagination.offset,
    };
  }

  async stats(): Promise<IdeaStatsResponse> {
    const repo = this.deps.ideaRepo;

    const [total, statusCounts, typeCounts, recent] = await Promise.all([
      repo.count(),
      Promise.all(IDEA_STATUSES.map((status) => repo.count({ status }))),
      Promise.all(IDEA_TYPES.map((type) => repo.count({ type }))),
      repo.list({}, { limit: RECENT_IDEAS, offset: 0 }),
    ]);

    return {
      total,
      byStatus: zipCounts(IDEA_STATUSES, statusCounts),
      byType: zipCounts(IDEA_TYPES, typeCounts),
      recent: recent.map(rowToIdeaResponse),
    };
  }

  async update(id: string, input: UpdateIdeaRequest, user: User): Promise<IdeaResponse> {
    const row = await this.requireIdea(id);
    this.assertCanEdit(row, user);

    const title = input.title?.trim() ?? row.title;
    const description = input.description?.trim() ?? row.description;
    this.validateText(title, description);
    if (input.title !== undefined || input.description !== undefined) {
      this.scan(title, description);
    }

    const data: Partial<IdeaRow> = {};
    if (input.title !== undefined) data.title = title;
    if (input.description !== undefined) data.description = description;
    if (input.type !== undefined) data.type = input.type;
    if (input.targetGroup !== undefined) data.target_group = input.targetGroup;
    if (input.priority !== undefined) data.priority = input.priority;
    if (input.category !== undefined) data.category = input.category.trim() || null;
    if (input.tags !== undefined) data.tags = normalizeTags(input.tags);

    const updated = await this.deps.ideaRepo.update(id, data);
    return rowToIdeaResponse(updated);
  }

  async updateStatus(id: string, status: IdeaStatus, user: User): Promise<IdeaResponse> {
    const row = await this.requireIdea(id);
    this.assertCanEdit(row, user);

    const updated = await this.deps.ideaRepo.update(id, { status });
    this.deps.logProvider.info('Idea status changed', {
      ideaId: id,
      from: row.status,
      to: status,
      userId: user.id,
    });
    return rowToIdeaResponse(updated);
  }

  async delete(id: string, user: User): Promise<void> {
    if (user.role !== 'admin') {
      throw new ForbiddenError('Only administrators can delete ideas');
    }
    await this.requireIdea(id);
    await this.deps.ideaRepo.delete(id);
    this.deps.logProvider.info('Idea deleted', { ideaId: id, userId: user.id });
  }

  /** Re-run analysis; unlike creation, a provider failure is reported to the caller. */
  async analyze(id: string): Promise<IdeaResponse> {
    const row = await this.requireIdea(id);
    const result = await this.runAnalysis(row);

    if (result.error) {
      throw new AnalysisFailedError(id, result.error);
    }
    return rowToIdeaResponse(result.row);
  }

  /** Recompute every idea after the service catalog changed. Runs one idea at a time. */
  async reanalyzeAll(): Promise<ReanalyzeResponse> {
    const ids = await this.deps.ideaRepo.listIds();
    let analyzed = 0;
    let failed = 0;

    for (const id of ids) {
      const row = await this.deps.ideaRepo.findById(id);
      if (!row) continue;

      const result = await this.runAnalysis(row);
      if (result.error) failed++;
      else analyzed++;
    }

    this.deps.logProvider.info('Bulk re-analysis finished', { total: ids.length, analyzed, failed });
    return { total: ids.length, analyzed, failed };
  }

  async gapReport(): Promise<GapReport> {
    const ideas = await this.deps.ideaRepo.findByAnalysisStatus('analyzed');
    return this.deps.gapAnalyzer.analyze(ideas);
  }

  // ── Analysis ──

  private async runAnalysis(row: IdeaRow): Promise<{ row: IdeaRow; error: ProviderError | null }> {
    let outcome: AnalysisOutcome;

    try {
      outcome = await this.deps.analysisService.analyze({
        title: row.title,
        description: row.description,
        type: row.type,
        targetGroup: row.target_group,
      });
    } catch (err) {
      // Any failure in the analysis step leaves the idea in the terminal `failed` state
      const failure = asProviderError(err);

      this.deps.logProvider.error('Idea analysis failed', {
        ideaId: row.id,
        provider: failure.provider,
        kind: failure.kind,
        error: failure.message,
      });

      const failed = await this.deps.ideaRepo.update(row.id, {
        analysis_status: 'failed',
        analysis_error: failure.message,
      });
      return { row: failed, error: failure };
    }

    const updated = await this.deps.ideaRepo.update(row.id, applyOutcome(row, outcome));

    this.deps.logProvider.info('Idea analyzed', {
      ideaId: row.id,
      category: outcome.categorization.category,
      recommendation: outcome.match.recommendation,
      serviceConfidence: outcome.match.confidence,
    });

    return { row: updated, error: null };
  }

  // ── Private ──

  private async requireIdea(id: string): Promise<IdeaRow> {
    const row = await this.deps.ideaRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Idea "${id}" not found`);
    }
    return row;
  }

  private assertCanEdit(row: IdeaRow, user: User): void {
    if (row.submitter_id !== user.id && user.role !== 'admin') {
      throw new ForbiddenError('Only the submitter or an administrator can change this idea');
    }
  }

  private validateText(title: string, description: string): void {
    if (title.length < TITLE_MIN || title.length > TITLE_MAX) {
      throw new ValidationError(`title must be ${TITLE_MIN}-${TITLE_MAX} characters`);
    }
    if (description.length < DESCRIPTION_MIN || description.length > DESCRIPTION_MAX) {
      throw new ValidationError(
        `description must be ${DESCRIPTION_MIN}-${DESCRIPTION_MAX} characters`
      );
    }
  }

  private scan(title: string, description: string): void {
    const result = this.scanner.scan({ title, description });
    if (result.flagged) {
      throw new ValidationError('Idea content was flagged by the content scanner', {
        reasons: result.reasons,
      });
    }
  }
}

// ── Mapping ──

/** AI fields written after a successful analysis. Status is never touched. */
export function applyOutcome(row: IdeaRow, outcome: AnalysisOutcome): Partial<IdeaRow> {
  const { categorization, match } = outcome;

  return {
    category: categorization.category,
    priority: categorization.priority,
    tags: mergeTags(row.tags, categorization.tags),
    ai_sentiment: categorization.sentiment,
    ai_confidence: categorization.confidence,
    ai_analysis_notes: outcome.notes,
    service_recommendation: match.recommendation,
    service_confidence: match.confidence,
    service_reasoning: match.reasoning,
    matching_services: match.matchingServices,
    development_impact: match.developmentImpact,
    analysis_status: 'analyzed',
    analysis_error: null,
    analyzed_at: new Date().toISOString(),
  };
}

/** Existing tags first, then new ones; de-duplicated and capped. */
export function mergeTags(existing: string[], added: string[]): string[] {
  return normalizeTags([...existing, ...added]);
}

export function normalizeTags(tags: string[]): string[] {
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (!tag || tag.length > MAX_TAG_LENGTH || result.includes(tag)) continue;
    result.push(tag);
    if (result.length === MAX_TAGS) break;
  }
  return result;
}

export function rowToIdeaResponse(row: IdeaRow): IdeaResponse {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    type: row.type,
    targetGroup: row.target_group,
    status: row.status,
    priority: row.priority,
    category: row.category,
    tags: row.tags,
    voteCount: row.vote_count,
    submitterId: row.submitter_id,
    aiSentiment: row.ai_sentiment,
    aiConfidence: row.ai_confidence,
    aiAnalysisNotes: row.ai_analysis_notes,
    serviceRecommendation: row.service_recommendation,
    serviceConfidence: row.service_confidence,
    serviceReasoning: row.service_reasoning,
    matchingServices: row.matching_services,
    developmentImpact: row.development_impact,
    analysis: {
      status: row.analysis_status,
      error: row.analysis_error,
      analyzedAt: row.analyzed_at,
    },
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function asProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderError('analysis', 'unavailable', err instanceof Error ? err.message : String(err));
}
