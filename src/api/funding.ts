/**
 * Funding call endpoints.
 * GET    /api/v1/funding            — List (filters source, status, search; paginated)
 * GET    /api/v1/funding/upcoming   — Open deadlines within `days` (default 30)
 * GET    /api/v1/funding/stats      — Counts, total budget, open calls
 * POST   /api/v1/funding            — Create (auth required)
 * GET    /api/v1/funding/:id        — One call
 * PUT    /api/v1/funding/:id        — Update (auth required)
 * DELETE /api/v1/funding/:id        — Delete (auth required)
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { UpdateFundingCallRequest } from '../types/api.js';
import { FUNDING_CALL_STATUSES, FUNDING_SOURCES } from '../types/models.js';
import { DEFAULT_UPCOMING_DAYS } from '../services/FundingService.js';
import {
  json,
  num,
  oneOf,
  pagination,
  pathParam,
  query,
  queryInt,
  queryOneOf,
  readJson,
  requireOneOf,
  requireStr,
  str,
  strings,
} from './body.js';

const fields: BodySchema = {
  title: { type: 'string', maxLength: 300 },
  description: { type: 'string', maxLength: 10000 },
  source: { type: 'string', enum: FUNDING_SOURCES },
  status: { type: 'string', enum: FUNDING_CALL_STATUSES },
  externalId: { type: 'string', maxLength: 200 },
  externalUrl: { type: 'string', maxLength: 2000 },
  openDate: { type: 'string' },
  deadline: { type: 'string' },
  decisionDate: { type: 'string' },
  totalBudget: { type: 'number', min: 0 },
  minGrant: { type: 'number', min: 0 },
  maxGrant: { type: 'number', min: 0 },
  coFundingRequirement: { type: 'number', min: 0, max: 100 },
  eligibleApplicants: { type: 'array', items: 'string', maxItems: 50 },
  focusAreas: { type: 'array', items: 'string', maxItems: 50 },
};

const createSchema: BodySchema = {
  ...fields,
  title: { type: 'string', required: true, minLength: 1, maxLength: 300 },
  source: { type: 'string', required: true, enum: FUNDING_SOURCES },
};

function fundingFields(body: Record<string, unknown>): UpdateFundingCallRequest {
  return {
    title: str(body, 'title'),
    description: str(body, 'description'),
    source: oneOf(FUNDING_SOURCES, body.source),
    status: oneOf(FUNDING_CALL_STATUSES, body.status),
    externalId: str(body, 'externalId'),
    externalUrl: str(body, 'externalUrl'),
    openDate: str(body, 'openDate'),
    deadline: str(body, 'deadline'),
    decisionDate: str(body, 'decisionDate'),
    totalBudget: num(body, 'totalBudget'),
    minGrant: num(body, 'minGrant'),
    maxGrant: num(body, 'maxGrant'),
    coFundingRequirement: num(body, 'coFundingRequirement'),
    eligibleApplicants: strings(body, 'eligibleApplicants'),
    focusAreas: strings(body, 'focusAreas'),
  };
}

export function createFundingHandlers(container: Container) {
  const mutate = (schema: BodySchema) =>
    pipeline(
      container.logging,
      container.errorHandler,
      container.bodyLimit,
      container.authenticate,
      validateBody(schema)
    );

  const list: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => {
      const result = await container.fundingService.list(
        {
          source: queryOneOf(req, 'source', FUNDING_SOURCES),
          status: queryOneOf(req, 'status', FUNDING_CALL_STATUSES),
          search: query(req, 'search'),
        },
        pagination(req)
      );
      return json(result);
    }
  );

  const upcoming: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) =>
      json(await container.fundingService.upcoming(queryInt(req, 'days') ?? DEFAULT_UPCOMING_DAYS))
  );

  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.fundingService.stats())
  );

  const create: Handler = mutate(createSchema)(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.fundingService.create({
      ...fundingFields(body),
      title: requireStr(body, 'title'),
      source: requireOneOf(FUNDING_SOURCES, body, 'source'),
    });

    return json(result, 201);
  });

  const getById: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => json(await container.fundingService.getById(pathParam(req)))
  );

  const update: Handler = mutate(fields)(async (req, _ctx) => {
    const body = await readJson(req);
    return json(await container.fundingService.update(pathParam(req), fundingFields(body)));
  });

  const remove: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, _ctx) => {
    await container.fundingService.delete(pathParam(req));
    return new Response(null, { status: 204 });
  });

  return { list, upcoming, stats, create, getById, update, delete: remove };
}
