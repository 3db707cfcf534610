/**
 * API Router
 * Central router for all API endpoints
 */

import { Hono } from 'hono';

import { conversationsRouter } from './conversations.js';
import { healthRouter } from './health.js';
import { statsRouter } from './stats.js';
import { turnsRouter } from './turns.js';
import type { AppEnv } from './utils.js';

export const apiRouter = new Hono<AppEnv>()
  .route('/conversations', conversationsRouter)
  .route('/turns', turnsRouter)
  .route('/stats', statsRouter)
  .route('/health', healthRouter);
