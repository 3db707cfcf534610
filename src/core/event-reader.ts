/**
 * Event Reader
 * Ordered event history of one conversation, optionally scoped to a session window
 */

import type { ConversationBackend } from './backend.js';
import { EventQuery } from './event-query.js';
import { applyWindow } from './session-resolver.js';
import type { SessionWindow } from './session-resolver.js';
import type { EventPayload } from './types.js';

/**
 * Finite, restartable view over a read result: every iteration starts at the first event.
 */
export class EventSequence implements Iterable<EventPayload> {
  private readonly events: readonly EventPayload[];

  constructor(events: readonly EventPayload[]) {
    this.events = [...events];
  }

  get length(): number {
    return this.events.length;
  }

  at(index: number): EventPayload | undefined {
    return this.events.at(index);
  }

  [Symbol.iterator](): Iterator<EventPayload> {
    return this.events[Symbol.iterator]();
  }

  toArray(): EventPayload[] {
    return [...this.events];
  }
}

export class EventReader {
  constructor(private readonly backend: ConversationBackend) {}

  /**
   * Returns null when no events exist under the key. Callers rely on the
   * distinction between null and an empty sequence: null means no conversation.
   */
  async read(senderId: string, window: SessionWindow): Promise<EventSequence | null> {
    const query = applyWindow(EventQuery.forConversation(senderId), window)
      .sorted(1)
      .collectAll();

    const events = await this.backend.aggregateEvents(query.build());
    if (events.length === 0) return null;
    return new EventSequence(events);
  }
}
