/**
 * Node entry point. Serves the router on PORT through @hono/node-server,
 * which adapts Node's HTTP server to the fetch-style handler.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { getProductionContainer } from './container.production.js';
import { createRouter } from './api/router.js';

const config = loadConfig();
const container = getProductionContainer(config);
const router = createRouter(container);

const server = serve(
  { fetch: (req) => router.handle(req, { user: null }), port: config.port },
  (info) => {
    container.logProvider.info('Server listening', { port: info.port });
  }
);

async function shutdown(signal: string): Promise<void> {
  container.logProvider.info('Shutting down', { signal });
  server.close();
  await container.logProvider.flush();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  });
}
