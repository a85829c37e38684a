/**
 * Project endpoints.
 * GET    /api/v1/projects                       — List with filters and pagination
 * GET    /api/v1/projects/stats                 — Counts, budget, linked ideas
 * POST   /api/v1/projects                       — Create, optionally linking ideas (auth required)
 * GET    /api/v1/projects/:id                   — One project with linked ideas
 * PUT    /api/v1/projects/:id                   — Update (auth required)
 * DELETE /api/v1/projects/:id                   — Delete (auth required)
 * POST   /api/v1/projects/:id/ideas             — Link an idea (auth required)
 * DELETE /api/v1/projects/:id/ideas/:ideaId     — Unlink an idea (auth required)
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { UpdateProjectRequest } from '../types/api.js';
import { PROJECT_RELATIONSHIPS, PROJECT_STATUSES, PROJECT_TYPES } from '../types/models.js';
import {
  json,
  num,
  oneOf,
  pagination,
  pathParam,
  query,
  queryOneOf,
  readJson,
  requireStr,
  str,
  strings,
} from './body.js';

const fields: BodySchema = {
  name: { type: 'string', maxLength: 200 },
  description: { type: 'string', maxLength: 5000 },
  status: { type: 'string', enum: PROJECT_STATUSES },
  projectType: { type: 'string', enum: PROJECT_TYPES },
  plannedStart: { type: 'string' },
  plannedEnd: { type: 'string' },
  actualStart: { type: 'string' },
  actualEnd: { type: 'string' },
  estimatedBudget: { type: 'number', min: 0 },
  fundingSource: { type: 'string', maxLength: 200 },
  ownerDepartment: { type: 'string', maxLength: 200 },
  contactEmail: { type: 'string', maxLength: 254 },
  projectManager: { type: 'string', maxLength: 200 },
};

const createSchema: BodySchema = {
  ...fields,
  name: { type: 'string', required: true, minLength: 1, maxLength: 200 },
  description: { type: 'string', required: true, minLength: 1, maxLength: 5000 },
  ideaIds: { type: 'array', items: 'string', maxItems: 100 },
};

const linkSchema: BodySchema = {
  ideaId: { type: 'string', required: true, minLength: 1 },
  relationshipType: { type: 'string', enum: PROJECT_RELATIONSHIPS },
  notes: { type: 'string', maxLength: 2000 },
};

function projectFields(body: Record<string, unknown>): UpdateProjectRequest {
  return {
    name: str(body, 'name'),
    description: str(body, 'description'),
    status: oneOf(PROJECT_STATUSES, body.status),
    projectType: oneOf(PROJECT_TYPES, body.projectType),
    plannedStart: str(body, 'plannedStart'),
    plannedEnd: str(body, 'plannedEnd'),
    actualStart: str(body, 'actualStart'),
    actualEnd: str(body, 'actualEnd'),
    estimatedBudget: num(body, 'estimatedBudget'),
    fundingSource: str(body, 'fundingSource'),
    ownerDepartment: str(body, 'ownerDepartment'),
    contactEmail: str(body, 'contactEmail'),
    projectManager: str(body, 'projectManager'),
  };
}

export function createProjectHandlers(container: Container) {
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
      const result = await container.projectService.list(
        {
          status: queryOneOf(req, 'status', PROJECT_STATUSES),
          projectType: queryOneOf(req, 'projectType', PROJECT_TYPES),
          department: query(req, 'department'),
          search: query(req, 'search'),
        },
        pagination(req)
      );
      return json(result);
    }
  );

  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.projectService.stats())
  );

  const create: Handler = mutate(createSchema)(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.projectService.create({
      ...projectFields(body),
      name: requireStr(body, 'name'),
      description: requireStr(body, 'description'),
      ideaIds: strings(body, 'ideaIds'),
    });

    return json(result, 201);
  });

  const getById: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => json(await container.projectService.getById(pathParam(req)))
  );

  const update: Handler = mutate(fields)(async (req, _ctx) => {
    const body = await readJson(req);
    return json(await container.projectService.update(pathParam(req), projectFields(body)));
  });

  const remove: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, _ctx) => {
    await container.projectService.delete(pathParam(req));
    return new Response(null, { status: 204 });
  });

  // Pattern: /api/v1/projects/:id/ideas
  const linkIdea: Handler = mutate(linkSchema)(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.projectService.linkIdea(pathParam(req, 1), {
      ideaId: requireStr(body, 'ideaId'),
      relationshipType: oneOf(PROJECT_RELATIONSHIPS, body.relationshipType),
      notes: str(body, 'notes'),
    });

    return json(result, 201);
  });

  // Pattern: /api/v1/projects/:id/ideas/:ideaId
  const unlinkIdea: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, _ctx) => {
    await container.projectService.unlinkIdea(pathParam(req, 2), pathParam(req));
    return new Response(null, { status: 204 });
  });

  return { list, stats, create, getById, update, delete: remove, linkIdea, unlinkIdea };
}
