/**
 * Health API
 * Storage reachability check
 */

import { Hono } from 'hono';

import { errorMessage } from './utils.js';
import type { AppEnv } from './utils.js';

export const healthRouter = new Hono<AppEnv>();

// GET /api/health
healthRouter.get('/', async (c) => {
  const store = c.get('store');
  try {
    const stats = await store.getStats();

    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      backend: store.backendKind,
      storage: {
        events: stats.events,
        flattenedTurns: stats.flattenedTurns
      }
    });
  } catch (error) {
    return c.json({
      status: 'error',
      timestamp: new Date().toISOString(),
      error: errorMessage(error)
    }, 500);
  }
});
