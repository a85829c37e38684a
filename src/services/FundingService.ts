/**
 * External funding calls (Vinnova, EU programmes, regional funds).
 */

import type { IFundingRepository, NewFundingCallRow } from '../repositories/IFundingRepository.js';
import type { FundingCallRow } from '../types/database.js';
import type {
  CreateFundingCallRequest,
  FundingCallResponse,
  FundingListFilters,
  FundingStatsResponse,
  UpcomingDeadlineResponse,
  UpdateFundingCallRequest,
} from '../types/api.js';
import type { PaginatedResult, PaginationOptions } from '../types/common.js';
import { FUNDING_CALL_STATUSES, FUNDING_SOURCES } from '../types/models.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { countBy } from './counting.js';

export const DEFAULT_UPCOMING_DAYS = 30;
const MAX_UPCOMING_DAYS = 365;
const DAY_MS = 86_400_000;

export class FundingService {
  constructor(
    private readonly fundingRepo: IFundingRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(
    filters: FundingListFilters,
    pagination: PaginationOptions
  ): Promise<PaginatedResult<FundingCallResponse>> {
    const [rows, total] = await Promise.all([
      this.fundingRepo.list(filters, pagination),
      this.fundingRepo.count(filters),
    ]);

    return {
      data: rows.map(rowToFundingResponse),
      total,
      limit: pagination.limit,
      offset: pagination.offset,
    };
  }

  /** Calls that are not closed and whose deadline falls within the next `days` days. */
  async upcoming(days = DEFAULT_UPCOMING_DAYS): Promise<UpcomingDeadlineResponse[]> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_UPCOMING_DAYS) {
      throw new ValidationError(`days must be an integer from 1 to ${MAX_UPCOMING_DAYS}`);
    }

    const now = this.now();
    const until = new Date(now.getTime() + days * DAY_MS);
    const rows = await this.fundingRepo.findByDeadlineBetween(
      now.toISOString(),
      until.toISOString()
    );

    return rows.map((row) => ({
      ...rowToFundingResponse(row),
      daysUntilDeadline: daysUntil(row.deadline, now),
    }));
  }

  async getById(id: string): Promise<FundingCallResponse> {
    return rowToFundingResponse(await this.requireCall(id));
  }

  async create(input: CreateFundingCallRequest): Promise<FundingCallResponse> {
    const title = input.title.trim();
    if (!title) {
      throw new ValidationError('title must not be empty');
    }

    const row: NewFundingCallRow = {
      title,
      description: input.description ?? null,
      source: input.source,
      status: input.status ?? 'upcoming',
      external_id: input.externalId ?? null,
      external_url: input.externalUrl ?? null,
      open_date: input.openDate ?? null,
      deadline: input.deadline ?? null,
      decision_date: input.decisionDate ?? null,
      total_budget: input.totalBudget ?? null,
      min_grant: input.minGrant ?? null,
      max_grant: input.maxGrant ?? null,
      co_funding_requirement: input.coFundingRequirement ?? null,
      eligible_applicants: input.eligibleApplicants ?? [],
      focus_areas: input.focusAreas ?? [],
    };
    checkAmounts(row);

    return rowToFundingResponse(await this.fundingRepo.insert(row));
  }

  async update(id: string, input: UpdateFundingCallRequest): Promise<FundingCallResponse> {
    const current = await this.requireCall(id);

    const data: Partial<FundingCallRow> = {};
    if (input.title !== undefined) {
      const title = input.title.trim();
      if (!title) throw new ValidationError('title must not be empty');
      data.title = title;
    }
    if (input.description !== undefined) data.description = input.description;
    if (input.source !== undefined) data.source = input.source;
    if (input.status !== undefined) data.status = input.status;
    if (input.externalId !== undefined) data.external_id = input.externalId;
    if (input.externalUrl !== undefined) data.external_url = input.externalUrl;
    if (input.openDate !== undefined) data.open_date = input.openDate;
    if (input.deadline !== undefined) data.deadline = input.deadline;
    if (input.decisionDate !== undefined) data.decision_date = input.decisionDate;
    if (input.totalBudget !== undefined) data.total_budget = input.totalBudget;
    if (input.minGrant !== undefined) data.min_grant = input.minGrant;
    if (input.maxGrant !== undefined) data.max_grant = input.maxGrant;
    if (input.coFundingRequirement !== undefined)
      data.co_funding_requirement = input.coFundingRequirement;
    if (input.eligibleApplicants !== undefined) data.eligible_applicants = input.eligibleApplicants;
    if (input.focusAreas !== undefined) data.focus_areas = input.focusAreas;

    checkAmounts({ ...current, ...data });

    return rowToFundingResponse(await this.fundingRepo.update(id, data));
  }

  async delete(id: string): Promise<void> {
    await this.requireCall(id);
    await this.fundingRepo.delete(id);
  }

  async stats(): Promise<FundingStatsResponse> {
    const rows = await this.fundingRepo.listAll();

    return {
      total: rows.length,
      bySource: countBy(FUNDING_SOURCES, rows, (r) => r.source),
      byStatus: countBy(FUNDING_CALL_STATUSES, rows, (r) => r.status),
      totalBudget: rows.reduce((sum, r) => sum + (r.total_budget ?? 0), 0),
      open: rows.filter((r) => r.status === 'open').length,
    };
  }

  // ── Private ──

  private async requireCall(id: string): Promise<FundingCallRow> {
    const row = await this.fundingRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Funding call "${id}" not found`);
    }
    return row;
  }
}

function checkAmounts(
  row: Pick<FundingCallRow, 'min_grant' | 'max_grant' | 'co_funding_requirement'>
): void {
  const cofunding = row.co_funding_requirement;
  if (cofunding !== null && (cofunding < 0 || cofunding > 100)) {
    throw new ValidationError('coFundingRequirement must be a percentage from 0 to 100');
  }
  if (row.min_grant !== null && row.max_grant !== null && row.min_grant > row.max_grant) {
    throw new ValidationError('minGrant must not exceed maxGrant');
  }
}

/** Whole days left, rounded up; 0 once the deadline has passed or is unset. */
export function daysUntil(deadline: string | null, now: Date): number {
  if (!deadline) return 0;
  const ms = Date.parse(deadline) - now.getTime();
  return ms > 0 ? Math.ceil(ms / DAY_MS) : 0;
}

export function rowToFundingResponse(row: FundingCallRow): FundingCallResponse {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    source: row.source,
    status: row.status,
    externalId: row.external_id,
    externalUrl: row.external_url,
    openDate: row.open_date,
    deadline: row.deadline,
    decisionDate: row.decision_date,
    totalBudget: row.total_budget,
    minGrant: row.min_grant,
    maxGrant: row.max_grant,
    coFundingRequirement: row.co_funding_requirement,
    eligibleApplicants: row.eligible_applicants,
    focusAreas: row.focus_areas,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
