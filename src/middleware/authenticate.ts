/**
 * Authentication middleware.
 * Extracts the Bearer token from the Authorization header, resolves it via
 * UserService, and attaches the user to the request context.
 */

import type { UserService } from '../services/UserService.js';
import type { User } from '../types/models.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';
import { ForbiddenError, UnauthorizedError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createAuthMiddleware(userService: UserService): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();

      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      let user: User;
      try {
        user = await userService.authenticate(apiKey);
      } catch (err) {
        if (err instanceof UnauthorizedError) {
          return unauthorized(err.message);
        }
        throw err;
      }

      ctx.user = user;
      return next(req, ctx);
    };
  };
}

/** Only administrators get through. Place after authentication. */
export function requireAdmin(next: Handler): Handler {
  return async (req, ctx) => {
    const user = requireUser(ctx);
    if (user.role !== 'admin') {
      throw new ForbiddenError('Administrator role required');
    }
    return next(req, ctx);
  };
}

/** The authenticated user, for handlers behind the auth middleware. */
export function requireUser(ctx: HandlerContext): User {
  if (!ctx.user) {
    throw new UnauthorizedError();
  }
  return ctx.user;
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({ error: { code: 'UNAUTHORIZED', message } }),
    { status: 401, headers: JSON_HEADERS }
  );
}
