/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 * Literal paths (`/ideas/stats`) are listed before their `:id` siblings.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createUserHandlers } from './users.js';
import { createIdeaHandlers } from './ideas.js';
import { createCategoryHandlers } from './categories.js';
import { createAnalysisHandlers } from './analysis.js';
import { createDocumentHandlers } from './documents.js';
import { createProjectHandlers } from './projects.js';
import { createStrategyHandlers } from './strategy.js';
import { createFundingHandlers } from './funding.js';
import { createHealthHandlers } from './health.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ID = '[^/]+';

function path(suffix: string): RegExp {
  return new RegExp(`^/api/v1/${suffix}/?$`);
}

export function createRouter(container: Container) {
  const users = createUserHandlers(container);
  const ideas = createIdeaHandlers(container);
  const categories = createCategoryHandlers(container);
  const analysis = createAnalysisHandlers(container);
  const documents = createDocumentHandlers(container);
  const projects = createProjectHandlers(container);
  const strategy = createStrategyHandlers(container);
  const funding = createFundingHandlers(container);
  const health = createHealthHandlers(container);

  const routes: Route[] = [
    // Health
    { method: 'GET', pattern: path('health'), handler: health.live },
    { method: 'GET', pattern: path('health/live'), handler: health.live },
    { method: 'GET', pattern: path('health/ready'), handler: health.ready },

    // Users
    { method: 'POST', pattern: path('users'), handler: users.register },
    { method: 'GET', pattern: path('users/me'), handler: users.me },
    { method: 'GET', pattern: path('users/me/votes'), handler: users.myVotes },

    // Ideas
    { method: 'GET', pattern: path('ideas'), handler: ideas.list },
    { method: 'POST', pattern: path('ideas'), handler: ideas.create },
    { method: 'GET', pattern: path('ideas/stats'), handler: ideas.stats },
    { method: 'GET', pattern: path(`ideas/${ID}`), handler: ideas.getById },
    { method: 'PUT', pattern: path(`ideas/${ID}`), handler: ideas.update },
    { method: 'DELETE', pattern: path(`ideas/${ID}`), handler: ideas.delete },
    { method: 'PUT', pattern: path(`ideas/${ID}/status`), handler: ideas.updateStatus },
    { method: 'POST', pattern: path(`ideas/${ID}/analyze`), handler: ideas.analyze },
    { method: 'GET', pattern: path(`ideas/${ID}/comments`), handler: ideas.listComments },
    { method: 'POST', pattern: path(`ideas/${ID}/comments`), handler: ideas.addComment },
    { method: 'GET', pattern: path(`ideas/${ID}/vote`), handler: ideas.voteStatus },
    { method: 'POST', pattern: path(`ideas/${ID}/vote`), handler: ideas.toggleVote },

    // Categories & analysis
    { method: 'GET', pattern: path('categories'), handler: categories.list },
    { method: 'GET', pattern: path('analysis/stats'), handler: analysis.stats },
    { method: 'POST', pattern: path('analysis/reanalyze'), handler: analysis.reanalyze },

    // Documents
    { method: 'GET', pattern: path('documents'), handler: documents.list },
    { method: 'GET', pattern: path('documents/stats'), handler: documents.stats },
    { method: 'POST', pattern: path('documents/upload'), handler: documents.upload },
    { method: 'POST', pattern: path('documents/upload-text'), handler: documents.uploadText },
    {
      method: 'POST',
      pattern: path('documents/upload-service-catalog'),
      handler: documents.uploadServiceCatalog,
    },
    { method: 'POST', pattern: path('documents/search'), handler: documents.search },
    { method: 'POST', pattern: path('documents/clear'), handler: documents.clear },
    { method: 'DELETE', pattern: path(`documents/${ID}`), handler: documents.delete },

    // Projects
    { method: 'GET', pattern: path('projects'), handler: projects.list },
    { method: 'POST', pattern: path('projects'), handler: projects.create },
    { method: 'GET', pattern: path('projects/stats'), handler: projects.stats },
    { method: 'GET', pattern: path(`projects/${ID}`), handler: projects.getById },
    { method: 'PUT', pattern: path(`projects/${ID}`), handler: projects.update },
    { method: 'DELETE', pattern: path(`projects/${ID}`), handler: projects.delete },
    { method: 'POST', pattern: path(`projects/${ID}/ideas`), handler: projects.linkIdea },
    { method: 'DELETE', pattern: path(`projects/${ID}/ideas/${ID}`), handler: projects.unlinkIdea },

    // Strategy
    { method: 'GET', pattern: path('strategy'), handler: strategy.list },
    { method: 'POST', pattern: path('strategy'), handler: strategy.create },
    { method: 'GET', pattern: path('strategy/tree'), handler: strategy.tree },
    { method: 'GET', pattern: path('strategy/stats'), handler: strategy.stats },
    { method: 'GET', pattern: path(`strategy/${ID}`), handler: strategy.getById },
    { method: 'PUT', pattern: path(`strategy/${ID}`), handler: strategy.update },
    { method: 'DELETE', pattern: path(`strategy/${ID}`), handler: strategy.delete },

    // Funding
    { method: 'GET', pattern: path('funding'), handler: funding.list },
    { method: 'POST', pattern: path('funding'), handler: funding.create },
    { method: 'GET', pattern: path('funding/upcoming'), handler: funding.upcoming },
    { method: 'GET', pattern: path('funding/stats'), handler: funding.stats },
    { method: 'GET', pattern: path(`funding/${ID}`), handler: funding.getById },
    { method: 'PUT', pattern: path(`funding/${ID}`), handler: funding.update },
    { method: 'DELETE', pattern: path(`funding/${ID}`), handler: funding.delete },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = [
        ...new Set(routes.filter((r) => r.pattern.test(url.pathname)).map((r) => r.method)),
      ].join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
