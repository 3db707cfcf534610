/**
 * Tests for SessionResolver
 */

import { describe, it, expect, vi } from 'vitest';
import { EventQuery } from '../src/core/event-query.js';
import { MemoryBackend } from '../src/core/memory-backend.js';
import { applyWindow, FULL_HISTORY, SessionResolver } from '../src/core/session-resolver.js';
import type { EventPayload } from '../src/core/types.js';
import { sessionStarted, userEvent } from './helpers.js';

async function seed(backend: MemoryBackend, senderId: string, events: EventPayload[]): Promise<void> {
  await backend.insertMany(events.map((event) => ({ sender_id: senderId, conversation_id: 'c1', event })));
}

describe('SessionResolver', () => {
  it('should return the full history window without querying', async () => {
    const backend = new MemoryBackend();
    const spy = vi.spyOn(backend, 'aggregateEvents');
    const resolver = new SessionResolver(backend);

    await expect(resolver.resolveWindow('u1', false)).resolves.toEqual(FULL_HISTORY);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should be unbounded when no session was started', async () => {
    const backend = new MemoryBackend();
    await seed(backend, 'u1', [userEvent(1, 'hi')]);
    const resolver = new SessionResolver(backend);

    await expect(resolver.resolveWindow('u1', true)).resolves.toEqual({
      start: null,
      currentSessionOnly: true
    });
  });

  it('should start at the latest session_started marker', async () => {
    const backend = new MemoryBackend();
    await seed(backend, 'u1', [sessionStarted(10), sessionStarted(30), sessionStarted(20)]);
    await seed(backend, 'u2', [sessionStarted(50)]);
    const resolver = new SessionResolver(backend);

    await expect(resolver.resolveWindow('u1', true)).resolves.toEqual({
      start: 30,
      currentSessionOnly: true
    });
  });
});

describe('applyWindow', () => {
  it('should leave full-history queries unfiltered', () => {
    const spec = applyWindow(EventQuery.forConversation('u1'), FULL_HISTORY).build();
    expect(spec.filter).toEqual({ senderId: 'u1' });
  });

  it('should exclude markers and bound the start in session mode', () => {
    const spec = applyWindow(EventQuery.forConversation('u1'), { start: 30, currentSessionOnly: true }).build();
    expect(spec.filter).toEqual({
      senderId: 'u1',
      eventType: { op: 'ne', value: 'session_started' },
      since: 30
    });
  });
});
