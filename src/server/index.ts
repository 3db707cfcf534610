/**
 * HTTP Server
 * REST API over a TrackerStore
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';

import type { TrackerStore } from '../core/tracker-store.js';
import { apiRouter } from './api/index.js';
import type { AppEnv } from './api/utils.js';

export interface CreateAppOptions {
  /** Request logging to stdout (default true) */
  requestLogging?: boolean;
}

export function createApp(store: TrackerStore, options: CreateAppOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Middleware
  app.use('/*', cors());
  if (options.requestLogging ?? true) {
    app.use('/*', logger());
  }
  app.use('/*', async (c, next) => {
    c.set('store', store);
    await next();
  });

  // API routes
  app.route('/api', apiRouter);

  // Liveness only; /api/health checks storage
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export interface StartServerOptions {
  host?: string;
  port?: number;
}

let serverInstance: ServerType | null = null;

/**
 * Start the HTTP server
 */
export function startServer(store: TrackerStore, options: StartServerOptions = {}): ServerType {
  if (serverInstance) {
    return serverInstance;
  }

  const hostname = options.host ?? '127.0.0.1';
  const port = options.port ?? 37778;

  serverInstance = serve({
    fetch: createApp(store).fetch,
    hostname,
    port
  });

  console.log(`🗂️  Tracker store API started at http://${hostname}:${port}`);

  return serverInstance;
}

/**
 * Stop the HTTP server
 */
export async function stopServer(): Promise<void> {
  const server = serverInstance;
  if (!server) return;
  serverInstance = null;

  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
