/**
 * Session Resolver
 *
 * A session window is the half-open interval [last session_started, +inf).
 * It is derived on every read and never stored.
 */

import type { ConversationBackend } from './backend.js';
import { EventQuery } from './event-query.js';
import { SESSION_STARTED } from './types.js';

export interface SessionWindow {
  /** Inclusive start timestamp; null means the full history */
  readonly start: number | null;
  /** Session-scoped reads leave session_started markers out of the result */
  readonly currentSessionOnly: boolean;
}

export const FULL_HISTORY: SessionWindow = Object.freeze({ start: null, currentSessionOnly: false });

export class SessionResolver {
  constructor(private readonly backend: ConversationBackend) {}

  async resolveWindow(senderId: string, currentSessionOnly: boolean): Promise<SessionWindow> {
    if (!currentSessionOnly) return FULL_HISTORY;

    // Equal maximum timestamps: whichever sorts last wins
    const query = EventQuery.forConversation(senderId)
      .ofType(SESSION_STARTED)
      .sorted(1)
      .lastOnly();

    const [lastSession] = await this.backend.aggregateEvents(query.build());
    return {
      start: lastSession ? lastSession.timestamp : null,
      currentSessionOnly: true
    };
  }
}

export function applyWindow(query: EventQuery, window: SessionWindow): EventQuery {
  let scoped = window.currentSessionOnly ? query.excluding(SESSION_STARTED) : query;
  if (window.start !== null) scoped = scoped.since(window.start);
  return scoped;
}
