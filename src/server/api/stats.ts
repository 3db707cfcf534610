/**
 * Stats API
 */

import { Hono } from 'hono';

import { errorMessage } from './utils.js';
import type { AppEnv } from './utils.js';

export const statsRouter = new Hono<AppEnv>();

// GET /api/stats - Document counts for the conversations collection
statsRouter.get('/', async (c) => {
  try {
    const store = c.get('store');
    const stats = await store.getStats();

    return c.json({
      backend: store.backendKind,
      storage: stats,
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024)
      }
    });
  } catch (error) {
    return c.json({ error: errorMessage(error) }, 500);
  }
});
