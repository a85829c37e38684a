/**
 * Strategy document endpoints.
 * GET    /api/v1/strategy          — List (filters documentType, level, isActive, search)
 * GET    /api/v1/strategy/tree     — Active documents nested by parent
 * GET    /api/v1/strategy/stats    — Counts by type and level
 * POST   /api/v1/strategy          — Create (auth required)
 * GET    /api/v1/strategy/:id      — One document with its children
 * PUT    /api/v1/strategy/:id      — Update (auth required)
 * DELETE /api/v1/strategy/:id      — Delete; children become roots (auth required)
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { UpdateStrategyDocumentRequest } from '../types/api.js';
import { STRATEGY_DOCUMENT_TYPES } from '../types/models.js';
import {
  bool,
  json,
  num,
  oneOf,
  pathParam,
  query,
  queryBool,
  queryInt,
  queryOneOf,
  readJson,
  requireOneOf,
  requireStr,
  str,
} from './body.js';

const fields: BodySchema = {
  title: { type: 'string', maxLength: 300 },
  description: { type: 'string', maxLength: 5000 },
  documentType: { type: 'string', enum: STRATEGY_DOCUMENT_TYPES },
  source: { type: 'string', maxLength: 200 },
  externalId: { type: 'string', maxLength: 200 },
  externalUrl: { type: 'string', maxLength: 2000 },
  content: { type: 'string', maxLength: 20000 },
  parentId: { type: 'string' },
  level: { type: 'number', min: 1, max: 3 },
  sortOrder: { type: 'number' },
  responsibleDepartment: { type: 'string', maxLength: 200 },
  responsiblePerson: { type: 'string', maxLength: 200 },
  timePeriod: { type: 'string', maxLength: 100 },
  validFrom: { type: 'string' },
  validTo: { type: 'string' },
  isActive: { type: 'boolean' },
};

const createSchema: BodySchema = {
  ...fields,
  title: { type: 'string', required: true, minLength: 1, maxLength: 300 },
  documentType: { type: 'string', required: true, enum: STRATEGY_DOCUMENT_TYPES },
};

function strategyFields(body: Record<string, unknown>): UpdateStrategyDocumentRequest {
  return {
    title: str(body, 'title'),
    description: str(body, 'description'),
    documentType: oneOf(STRATEGY_DOCUMENT_TYPES, body.documentType),
    source: str(body, 'source'),
    externalId: str(body, 'externalId'),
    externalUrl: str(body, 'externalUrl'),
    content: str(body, 'content'),
    parentId: str(body, 'parentId'),
    level: num(body, 'level'),
    sortOrder: num(body, 'sortOrder'),
    responsibleDepartment: str(body, 'responsibleDepartment'),
    responsiblePerson: str(body, 'responsiblePerson'),
    timePeriod: str(body, 'timePeriod'),
    validFrom: str(body, 'validFrom'),
    validTo: str(body, 'validTo'),
    isActive: bool(body, 'isActive'),
  };
}

export function createStrategyHandlers(container: Container) {
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
      const result = await container.strategyService.list({
        documentType: queryOneOf(req, 'documentType', STRATEGY_DOCUMENT_TYPES),
        level: queryInt(req, 'level'),
        isActive: queryBool(req, 'isActive'),
        search: query(req, 'search'),
      });
      return json(result);
    }
  );

  const tree: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.strategyService.tree())
  );

  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.strategyService.stats())
  );

  const create: Handler = mutate(createSchema)(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.strategyService.create({
      ...strategyFields(body),
      title: requireStr(body, 'title'),
      documentType: requireOneOf(STRATEGY_DOCUMENT_TYPES, body, 'documentType'),
    });

    return json(result, 201);
  });

  const getById: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => json(await container.strategyService.getById(pathParam(req)))
  );

  const update: Handler = mutate(fields)(async (req, _ctx) => {
    const body = await readJson(req);
    return json(await container.strategyService.update(pathParam(req), strategyFields(body)));
  });

  const remove: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, _ctx) => {
    await container.strategyService.delete(pathParam(req));
    return new Response(null, { status: 204 });
  });

  return { list, tree, stats, create, getById, update, delete: remove };
}
