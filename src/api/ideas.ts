/**
 * Idea endpoints.
 * GET    /api/v1/ideas                 — List with filters and pagination
 * GET    /api/v1/ideas/stats           — Counts by status and type, newest ideas
 * POST   /api/v1/ideas                 — Submit an idea; runs AI analysis (auth required)
 * GET    /api/v1/ideas/:id             — One idea with its comments
 * PUT    /api/v1/ideas/:id             — Edit (auth required, submitter or admin)
 * PUT    /api/v1/ideas/:id/status      — Change status (auth required, submitter or admin)
 * DELETE /api/v1/ideas/:id             — Delete (admin)
 * POST   /api/v1/ideas/:id/analyze     — Re-run AI analysis (auth required)
 * GET    /api/v1/ideas/:id/comments    — Comments, oldest first
 * POST   /api/v1/ideas/:id/comments    — Add a comment (auth required)
 * GET    /api/v1/ideas/:id/vote        — Whether the caller has voted (auth required)
 * POST   /api/v1/ideas/:id/vote        — Toggle the caller's vote (auth required)
 */

import { pipeline, requireAdmin, requireUser } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import {
  IDEA_STATUSES,
  IDEA_TYPES,
  PRIORITIES,
  TARGET_GROUPS,
} from '../types/models.js';
import {
  DESCRIPTION_MAX,
  DESCRIPTION_MIN,
  MAX_TAGS,
  TITLE_MAX,
  TITLE_MIN,
} from '../services/IdeaService.js';
import { COMMENT_MAX, COMMENT_MIN } from '../services/CommentService.js';
import {
  json,
  oneOf,
  pagination,
  pathParam,
  query,
  queryOneOf,
  readJson,
  requireOneOf,
  requireStr,
  str,
  strings,
} from './body.js';

const createSchema: BodySchema = {
  title: { type: 'string', required: true, minLength: TITLE_MIN, maxLength: TITLE_MAX },
  description: {
    type: 'string',
    required: true,
    minLength: DESCRIPTION_MIN,
    maxLength: DESCRIPTION_MAX,
  },
  type: { type: 'string', required: true, enum: IDEA_TYPES },
  targetGroup: { type: 'string', required: true, enum: TARGET_GROUPS },
  tags: { type: 'array', required: false, items: 'string', maxItems: MAX_TAGS },
};

const updateSchema: BodySchema = {
  title: { type: 'string', required: false, minLength: TITLE_MIN, maxLength: TITLE_MAX },
  description: {
    type: 'string',
    required: false,
    minLength: DESCRIPTION_MIN,
    maxLength: DESCRIPTION_MAX,
  },
  type: { type: 'string', required: false, enum: IDEA_TYPES },
  targetGroup: { type: 'string', required: false, enum: TARGET_GROUPS },
  priority: { type: 'string', required: false, enum: PRIORITIES },
  category: { type: 'string', required: false, maxLength: 100 },
  tags: { type: 'array', required: false, items: 'string', maxItems: MAX_TAGS },
};

const statusSchema: BodySchema = {
  status: { type: 'string', required: true, enum: IDEA_STATUSES },
};

const commentSchema: BodySchema = {
  content: { type: 'string', required: true, minLength: COMMENT_MIN, maxLength: COMMENT_MAX },
};

export function createIdeaHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => {
      const result = await container.ideaService.list(
        {
          status: queryOneOf(req, 'status', IDEA_STATUSES),
          type: queryOneOf(req, 'type', IDEA_TYPES),
          priority: queryOneOf(req, 'priority', PRIORITIES),
          targetGroup: queryOneOf(req, 'targetGroup', TARGET_GROUPS),
          category: query(req, 'category'),
          tag: query(req, 'tag'),
          search: query(req, 'search'),
        },
        pagination(req)
      );
      return json(result);
    }
  );

  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.ideaService.stats())
  );

  const create: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.authenticate,
    container.rateLimit.createIdea,
    // Malformed submissions must not spend the shared analysis budget
    validateBody(createSchema),
    container.rateLimit.analysisBudget
  )(async (req, ctx) => {
    const body = await readJson(req);

    const result = await container.ideaService.create(
      {
        title: requireStr(body, 'title'),
        description: requireStr(body, 'description'),
        type: requireOneOf(IDEA_TYPES, body, 'type'),
        targetGroup: requireOneOf(TARGET_GROUPS, body, 'targetGroup'),
        tags: strings(body, 'tags'),
      },
      requireUser(ctx)
    );

    return json(result, 201);
  });

  const getById: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => json(await container.ideaService.getById(pathParam(req)))
  );

  const update: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.authenticate,
    validateBody(updateSchema)
  )(async (req, ctx) => {
    const body = await readJson(req);

    const result = await container.ideaService.update(
      pathParam(req),
      {
        title: str(body, 'title'),
        description: str(body, 'description'),
        type: oneOf(IDEA_TYPES, body.type),
        targetGroup: oneOf(TARGET_GROUPS, body.targetGroup),
        priority: oneOf(PRIORITIES, body.priority),
        category: str(body, 'category'),
        tags: strings(body, 'tags'),
      },
      requireUser(ctx)
    );

    return json(result);
  });

  // Pattern: /api/v1/ideas/:id/status
  const updateStatus: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.authenticate,
    validateBody(statusSchema)
  )(async (req, ctx) => {
    const body = await readJson(req);

    const result = await container.ideaService.updateStatus(
      pathParam(req, 1),
      requireOneOf(IDEA_STATUSES, body, 'status'),
      requireUser(ctx)
    );

    return json(result);
  });

  const remove: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    requireAdmin
  )(async (req, ctx) => {
    await container.ideaService.delete(pathParam(req), requireUser(ctx));
    return new Response(null, { status: 204 });
  });

  // Pattern: /api/v1/ideas/:id/analyze
  const analyze: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.analysisBudget
  )(async (req, _ctx) => json(await container.ideaService.analyze(pathParam(req, 1))));

  // Pattern: /api/v1/ideas/:id/comments
  const listComments: Handler = pipeline(container.logging, container.errorHandler)(
    async (req, _ctx) => json(await container.commentService.list(pathParam(req, 1)))
  );

  const addComment: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.authenticate,
    container.rateLimit.comment,
    validateBody(commentSchema)
  )(async (req, ctx) => {
    const body = await readJson(req);

    const result = await container.commentService.add(
      pathParam(req, 1),
      requireStr(body, 'content'),
      requireUser(ctx)
    );

    return json(result, 201);
  });

  // Pattern: /api/v1/ideas/:id/vote
  const toggleVote: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.vote
  )(async (req, ctx) => {
    const user = requireUser(ctx);
    return json(await container.voteService.toggle(pathParam(req, 1), user.id));
  });

  const voteStatus: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const user = requireUser(ctx);
    return json(await container.voteService.status(pathParam(req, 1), user.id));
  });

  return {
    list,
    stats,
    create,
    getById,
    update,
    updateStatus,
    delete: remove,
    analyze,
    listComments,
    addComment,
    toggleVote,
    voteStatus,
  };
}
