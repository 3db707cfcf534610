/**
 * Conversations API
 * Read and append conversation event histories
 */

import { Hono } from 'hono';
import { z } from 'zod';

import { InvalidEventError } from '../../core/errors.js';
import { toFlattenedTurn } from '../../core/flattened-view.js';
import { errorMessage, isValidLimit, parseNumberParam } from './utils.js';
import type { AppEnv } from './utils.js';

const SaveRequestSchema = z.object({
  events: z.array(z.unknown())
});

export const conversationsRouter = new Hono<AppEnv>();

// GET /api/conversations - List known conversation keys
conversationsRouter.get('/', async (c) => {
  try {
    const keys = await c.get('store').keys();
    return c.json({ keys, total: keys.length });
  } catch (error) {
    return c.json({ error: errorMessage(error) }, 500);
  }
});

// GET /api/conversations/:senderId?scope=session|full
conversationsRouter.get('/:senderId', async (c) => {
  const { senderId } = c.req.param();
  const scope = c.req.query('scope') ?? 'session';

  if (scope !== 'session' && scope !== 'full') {
    return c.json({ error: 'scope must be "session" or "full"' }, 400);
  }

  try {
    const store = c.get('store');
    const tracker = scope === 'full'
      ? await store.retrieveFull(senderId)
      : await store.retrieve(senderId);

    if (!tracker) {
      return c.json({ error: 'Conversation not found' }, 404);
    }

    return c.json({
      senderId: tracker.senderId,
      scope,
      eventCount: tracker.events.length,
      events: tracker.events
    });
  } catch (error) {
    return c.json({ error: errorMessage(error) }, 500);
  }
});

// POST /api/conversations/:senderId/events - Save the full event history
conversationsRouter.post('/:senderId/events', async (c) => {
  const { senderId } = c.req.param();

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: 'Request body must be JSON' }, 400);
  }

  const parsed = SaveRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: 'Request body must be { events: [...] }' }, 400);
  }

  try {
    const result = await c.get('store').save({ senderId, events: parsed.data.events });
    return c.json({
      senderId,
      persistedBefore: result.persistedBefore,
      appended: result.appended.length,
      turnId: result.turnId,
      flattened: result.flattened ? toFlattenedTurn(result.flattened) : null
    });
  } catch (error) {
    if (error instanceof InvalidEventError) {
      return c.json({ error: error.message, index: error.index }, 400);
    }
    return c.json({ error: errorMessage(error) }, 500);
  }
});

// GET /api/conversations/:senderId/turns - Flattened turns of one conversation
conversationsRouter.get('/:senderId/turns', async (c) => {
  const { senderId } = c.req.param();
  const since = parseNumberParam(c.req.query('since'));
  const limit = parseNumberParam(c.req.query('limit'));

  if (since === null || limit === null || !isValidLimit(limit)) {
    return c.json({ error: 'since must be a number and limit a positive integer' }, 400);
  }

  try {
    const turns = await c.get('store').getFlattenedTurns({ senderId, since, limit });
    return c.json({ senderId, turns, total: turns.length });
  } catch (error) {
    return c.json({ error: errorMessage(error) }, 500);
  }
});
