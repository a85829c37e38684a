/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become
 * 500 and are logged with their message, which never reaches the client.
 */

import { AppError, RateLimitError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          return appErrorResponse(err);
        }

        logProvider?.error('Unhandled error', {
          method: req.method,
          path: new URL(req.url).pathname,
          error: err instanceof Error ? err.message : String(err),
        });

        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}

/** Error handler without logging, for tests and standalone handlers. */
export const errorHandler: Middleware = createErrorHandler();

export function appErrorResponse(err: AppError): Response {
  const body: ApiErrorResponse = {
    error: {
      code: err.code,
      message: err.message,
      ...(err.details && { details: err.details }),
    },
  };

  const headers: Record<string, string> = { ...JSON_HEADERS };

  if (err instanceof RateLimitError && err.details?.retryAfter) {
    headers['Retry-After'] = String(err.details.retryAfter);
  }

  return new Response(JSON.stringify(body), {
    status: err.statusCode,
    headers,
  });
}
