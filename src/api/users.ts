/**
 * User endpoints.
 * POST /api/v1/users            — Register; returns the API key once
 * GET  /api/v1/users/me         — The signed-in user (auth required)
 * GET  /api/v1/users/me/votes   — Idea ids the signed-in user voted for (auth required)
 */

import { pipeline, requireUser } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { json, readJson, requireStr, str } from './body.js';

const registerSchema: BodySchema = {
  name: { type: 'string', required: true, minLength: 1, maxLength: 100 },
  email: { type: 'string', required: true, maxLength: 254 },
  department: { type: 'string', required: false, maxLength: 100 },
};

export function createUserHandlers(container: Container) {
  const register: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.rateLimit.register,
    validateBody(registerSchema)
  )(async (req, _ctx) => {
    const body = await readJson(req);

    const result = await container.userService.register({
      name: requireStr(body, 'name'),
      email: requireStr(body, 'email'),
      department: str(body, 'department'),
    });

    return json(result, 201);
  });

  const me: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    const user = requireUser(ctx);
    return json(await container.userService.getById(user.id));
  });

  const myVotes: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    const user = requireUser(ctx);
    return json(await container.userService.getVotes(user.id));
  });

  return { register, me, myVotes };
}
