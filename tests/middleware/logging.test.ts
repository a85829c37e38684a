import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import { pipeline } from '../../src/middleware/pipeline.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NotFoundError } from '../../src/errors.js';
import { member } from '../mocks/users.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { RequestLogEvent } from '../../src/providers/ILogProvider.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://ideas.example.org${path}`, { method });
}

function anonymous(): HandlerContext {
  return { user: null };
}

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  function lastEvent(): RequestLogEvent {
    return logProvider.events[logProvider.events.length - 1] as RequestLogEvent;
  }

  it('should log a successful request', async () => {
    const handler: Handler = async () => new Response('{}', { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/ideas/stats'), anonymous());

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);

    const event = lastEvent();
    expect(event).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/ideas/stats',
      status: 200,
    });
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
    expect(event.message).toBe(`GET /api/v1/ideas/stats → 200 (${event.durationMs}ms)`);
    expect(event.userId).toBeUndefined();
  });

  it('should leave the query string out of the path', async () => {
    const handler: Handler = async () => new Response('[]');

    await middleware(handler)(makeRequest('GET', '/api/v1/ideas?status=new&limit=5'), anonymous());

    expect(lastEvent().path).toBe('/api/v1/ideas');
  });

  it('should return the response untouched', async () => {
    const handler: Handler = async () =>
      new Response('{"id":"idea-1"}', {
        status: 201,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/ideas'), anonymous());

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe('{"id":"idea-1"}');
  });

  it('should log client errors as warnings', async () => {
    const handler: Handler = async () => new Response('{}', { status: 404 });

    await middleware(handler)(makeRequest('GET', '/api/v1/ideas/missing'), anonymous());

    expect(lastEvent().level).toBe('warn');
  });

  it('should log server errors as errors', async () => {
    const handler: Handler = async () => new Response('{}', { status: 502 });

    await middleware(handler)(makeRequest('POST', '/api/v1/ideas/idea-1/analyze'), anonymous());

    expect(lastEvent()).toMatchObject({ level: 'error', status: 502 });
  });

  it('should include the session user', async () => {
    const handler: Handler = async () => new Response('{}');

    await middleware(handler)(makeRequest('GET', '/api/v1/users/me'), { user: member });

    expect(lastEvent().userId).toBe('user-member');
  });

  it('should see a user set further down the pipeline', async () => {
    const handler: Handler = async (_req, ctx) => {
      ctx.user = member;
      return new Response('{}');
    };

    await middleware(handler)(makeRequest('POST', '/api/v1/ideas'), anonymous());

    expect(lastEvent().userId).toBe('user-member');
  });

  it('should log and rethrow handler exceptions', async () => {
    const handler: Handler = async () => {
      throw new Error('database offline');
    };

    await expect(
      middleware(handler)(makeRequest('GET', '/api/v1/projects'), anonymous())
    ).rejects.toThrow('database offline');

    expect(lastEvent()).toMatchObject({
      level: 'error',
      status: 500,
      fields: { error: 'database offline' },
    });
  });

  it('should log the mapped status when the error handler sits inside', async () => {
    const handler: Handler = async () => {
      throw new NotFoundError('Idea "x" not found');
    };
    const wrapped = pipeline(middleware, createErrorHandler(logProvider))(handler);

    const response = await wrapped(makeRequest('GET', '/api/v1/ideas/x'), anonymous());

    expect(response.status).toBe(404);
    expect(logProvider.events).toHaveLength(1);
    expect(lastEvent()).toMatchObject({ level: 'warn', status: 404 });
  });
});
