/**
 * Event factories shared by the tests. Timestamps are unix seconds.
 */

import type { EventPayload } from '../src/core/types.js';

export function userEvent(
  timestamp: number,
  text: string,
  intent = 'greet',
  confidence = 0.9
): EventPayload {
  return {
    event: 'user',
    timestamp,
    text,
    parse_data: {
      intent: { name: intent, confidence },
      entities: []
    }
  };
}

export function actionEvent(timestamp: number, name: string): EventPayload {
  return { event: 'action', timestamp, name, policy: 'rule', confidence: 1 };
}

export function botEvent(timestamp: number, text: string, data: unknown = { buttons: [] }): EventPayload {
  return { event: 'bot', timestamp, text, data };
}

export function sessionStarted(timestamp: number): EventPayload {
  return { event: 'session_started', timestamp };
}

export function slotEvent(timestamp: number, name: string, value: unknown): EventPayload {
  return { event: 'slot', timestamp, name, value };
}

/** A greeting exchange: user, two actions, one bot reply */
export function greetingTurn(start: number): EventPayload[] {
  return [
    userEvent(start, 'hello there'),
    actionEvent(start + 1, 'utter_greet'),
    botEvent(start + 2, 'Hi! How can I help?'),
    actionEvent(start + 3, 'action_listen')
  ];
}
