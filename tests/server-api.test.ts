/**
 * Tests for the REST API over an in-process store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryBackend } from '../src/core/memory-backend.js';
import { TrackerStore } from '../src/core/tracker-store.js';
import { createApp } from '../src/server/index.js';
import { greetingTurn, sessionStarted, userEvent } from './helpers.js';

describe('HTTP API', () => {
  let store: TrackerStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = await TrackerStore.open({ backend: new MemoryBackend(), generateTurnId: () => 'turn-1' });
    app = createApp(store, { requestLogging: false });
  });

  afterEach(async () => {
    await store.close();
  });

  function postEvents(senderId: string, body: unknown) {
    return app.request(`/api/conversations/${senderId}/events`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });
  }

  describe('POST /api/conversations/:senderId/events', () => {
    it('should append new events', async () => {
      const res = await postEvents('u1', { events: greetingTurn(100) });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        senderId: 'u1',
        persistedBefore: 0,
        appended: 4,
        turnId: 'turn-1',
        flattened: {
          conversationKey: 'u1',
          turnId: 'turn-1',
          timestamp: 100,
          userInput: 'hello there',
          intentName: 'greet',
          intentConfidence: 0.9,
          actionNames: ['utter_greet', 'action_listen'],
          botResponses: [{ text: 'Hi! How can I help?', data: { buttons: [] } }]
        }
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await app.request('/api/conversations/u1/events', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json'
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be JSON' });
    });

    it('should reject a body without an events array', async () => {
      const res = await postEvents('u1', { events: 'nope' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be { events: [...] }' });
    });

    it('should point at the first invalid event', async () => {
      const res = await postEvents('u1', { events: [userEvent(1, 'ok'), { event: 'user' }] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Invalid event at position 1: timestamp: Required',
        index: 1
      });
    });
  });

  describe('GET /api/conversations/:senderId', () => {
    beforeEach(async () => {
      await store.save({
        senderId: 'u1',
        events: [userEvent(1, 'old'), sessionStarted(5), userEvent(6, 'new')]
      });
    });

    it('should return the current session by default', async () => {
      const res = await app.request('/api/conversations/u1');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        senderId: 'u1',
        scope: 'session',
        eventCount: 1,
        events: [userEvent(6, 'new')]
      });
    });

    it('should return the full history on request', async () => {
      const res = await app.request('/api/conversations/u1?scope=full');

      expect(await res.json()).toMatchObject({ scope: 'full', eventCount: 3 });
    });

    it('should reject an unknown scope', async () => {
      const res = await app.request('/api/conversations/u1?scope=week');
      expect(res.status).toBe(400);
    });

    it('should answer 404 for an unknown conversation', async () => {
      const res = await app.request('/api/conversations/ghost');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Conversation not found' });
    });
  });

  describe('listing endpoints', () => {
    beforeEach(async () => {
      await store.save({ senderId: 'u1', events: greetingTurn(100) });
    });

    it('should list conversation keys', async () => {
      const res = await app.request('/api/conversations');
      expect(await res.json()).toEqual({ keys: ['u1'], total: 1 });
    });

    it('should list flattened turns of one conversation', async () => {
      const res = await app.request('/api/conversations/u1/turns?since=50');

      expect(await res.json()).toMatchObject({
        senderId: 'u1',
        total: 1,
        turns: [{ turnId: 'turn-1', timestamp: 100 }]
      });
    });

    it('should list flattened turns across conversations', async () => {
      const res = await app.request('/api/turns?since=101');
      expect(await res.json()).toEqual({ turns: [], total: 0 });
    });

    it('should reject a zero or non-numeric limit', async () => {
      expect((await app.request('/api/turns?limit=0')).status).toBe(400);
      expect((await app.request('/api/turns?limit=ten')).status).toBe(400);
    });

    it('should report storage counts', async () => {
      const res = await app.request('/api/stats');

      expect(await res.json()).toMatchObject({
        backend: 'memory',
        storage: { conversations: 1, events: 4, flattenedTurns: 1 }
      });
    });
  });

  describe('health', () => {
    it('should report storage health', async () => {
      const res = await app.request('/api/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'ok',
        backend: 'memory',
        storage: { events: 0, flattenedTurns: 0 }
      });
    });

    it('should answer 500 once the store is closed', async () => {
      await store.close();

      const res = await app.request('/api/health');

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({
        status: 'error',
        error: 'Tracker store is closed'
      });
    });

    it('should answer 404 JSON for unknown routes', async () => {
      const res = await app.request('/nowhere');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });
  });
});
