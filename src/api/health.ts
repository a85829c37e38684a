/**
 * Health endpoints.
 * GET /api/v1/health         — Process is up
 * GET /api/v1/health/live    — Liveness
 * GET /api/v1/health/ready   — Readiness; 503 when a dependency check fails
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './body.js';

export function createHealthHandlers(container: Container) {
  const live: Handler = pipeline(container.errorHandler)(async (_req, _ctx) =>
    json(container.healthService.live())
  );

  const ready: Handler = pipeline(container.errorHandler)(async (_req, _ctx) => {
    const result = await container.healthService.ready();
    return json(result, result.status === 'ok' ? 200 : 503);
  });

  return { live, ready };
}
