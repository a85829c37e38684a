/**
 * GET /api/v1/categories — The fixed idea categories used by AI analysis.
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { CategoryResponse } from '../types/api.js';
import { IDEA_CATEGORIES } from '../catalog/categories.js';
import { json } from './body.js';

export function createCategoryHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, container.errorHandler)(
    async (_req, _ctx) => {
      const result: CategoryResponse[] = IDEA_CATEGORIES.map((c) => ({
        name: c.name,
        description: c.description,
      }));
      return json(result);
    }
  );

  return { list };
}
