/**
 * Turns API
 * Flattened user-turn records across conversations, for analytics
 */

import { Hono } from 'hono';

import { errorMessage, isValidLimit, parseNumberParam } from './utils.js';
import type { AppEnv } from './utils.js';

export const turnsRouter = new Hono<AppEnv>();

// GET /api/turns?since=<timestamp>&limit=<n>&senderId=<key>
turnsRouter.get('/', async (c) => {
  const senderId = c.req.query('senderId') || undefined;
  const since = parseNumberParam(c.req.query('since'));
  const limit = parseNumberParam(c.req.query('limit') ?? '100');

  if (since === null || limit === null || !isValidLimit(limit)) {
    return c.json({ error: 'since must be a number and limit a positive integer' }, 400);
  }

  try {
    const turns = await c.get('store').getFlattenedTurns({ senderId, since, limit });
    return c.json({ turns, total: turns.length });
  } catch (error) {
    return c.json({ error: errorMessage(error) }, 500);
  }
});
