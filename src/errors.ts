/**
 * Application error hierarchy.
 * Each error carries an HTTP status and a stable error code; the error handler
 * middleware turns them into JSON responses.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'INVALID_REQUEST', message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, 'UNAUTHORIZED', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'You do not have permission to perform this action') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, 'CONFLICT', message, details);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${maxBytes} bytes`, {
      maxBytes,
    });
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super(429, 'RATE_LIMITED', 'Rate limit exceeded', { retryAfter });
  }
}

export type ProviderErrorKind = 'unavailable' | 'rate_limited' | 'invalid_input';

/** An external AI provider (embeddings, categorization) failed. */
export class ProviderError extends AppError {
  constructor(
    readonly provider: string,
    readonly kind: ProviderErrorKind,
    message: string
  ) {
    super(502, 'PROVIDER_ERROR', message, { provider, kind });
  }

  /** Map an HTTP status from a provider API onto an error kind. */
  static kindForStatus(status: number): ProviderErrorKind {
    if (status === 429) return 'rate_limited';
    if (status === 400 || status === 413 || status === 422) return 'invalid_input';
    return 'unavailable';
  }
}

/** Analysis of an idea could not complete; the idea is left in the `failed` state. */
export class AnalysisFailedError extends AppError {
  constructor(ideaId: string, cause: ProviderError) {
    super(502, 'ANALYSIS_FAILED', `Analysis failed for idea "${ideaId}": ${cause.message}`, {
      ideaId,
      provider: cause.provider,
      kind: cause.kind,
    });
  }
}
