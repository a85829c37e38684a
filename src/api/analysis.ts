/**
 * Analysis endpoints.
 * GET  /api/v1/analysis/stats      — Service coverage and gap report
 * POST /api/v1/analysis/reanalyze  — Re-run analysis on every idea (admin)
 */

import { pipeline, requireAdmin } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { json } from './body.js';

export function createAnalysisHandlers(container: Container) {
  const stats: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => json(await container.ideaService.gapReport())
  );

  const reanalyze: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    requireAdmin,
    container.rateLimit.analysisBudget
  )(async (_req, _ctx) => json(await container.ideaService.reanalyzeAll()));

  return { stats, reanalyze };
}
