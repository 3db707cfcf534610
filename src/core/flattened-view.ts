/**
 * Flattened View Materializer
 *
 * Projects one write batch into a single read-optimized turn record:
 * the first user utterance of the batch plus every action and bot reply that
 * came with it. Built at write time, never rebuilt from history.
 */

import { normalizeSenderId } from './conversation-key.js';
import { classifyEvent, FLATTENED_TYPE } from './types.js';
import type {
  BotResponse,
  ClassifiedEvent,
  EventPayload,
  FlattenedTurn,
  FlattenedTurnDocument
} from './types.js';

type UserClassification = Extract<ClassifiedEvent, { kind: 'user' }>;

export function materializeFlattenedTurn(
  senderId: string,
  suffix: readonly EventPayload[],
  turnId: string
): FlattenedTurnDocument | null {
  let firstUser: UserClassification | null = null;
  const actions: Array<string | null> = [];
  const botResponses: BotResponse[] = [];

  for (const payload of suffix) {
    const classified = classifyEvent(payload);
    switch (classified.kind) {
      case 'user':
        if (!firstUser) firstUser = classified;
        break;
      case 'action':
        actions.push(classified.name);
        break;
      case 'bot':
        botResponses.push({ text: classified.text, data: classified.data });
        break;
      default:
        break;
    }
  }

  if (!firstUser) return null;

  return {
    type: FLATTENED_TYPE,
    sender_id: senderId,
    conversation_id: turnId,
    timestamp: firstUser.payload.timestamp,
    data: {
      user_input: firstUser.text,
      intent: firstUser.intentName,
      confidence: firstUser.confidence,
      action: actions,
      bot_response: botResponses
    }
  };
}

export function toFlattenedTurn(doc: FlattenedTurnDocument): FlattenedTurn {
  return {
    conversationKey: normalizeSenderId(doc.sender_id),
    turnId: doc.conversation_id,
    timestamp: doc.timestamp,
    userInput: doc.data.user_input,
    intentName: doc.data.intent,
    intentConfidence: doc.data.confidence,
    actionNames: [...doc.data.action],
    botResponses: doc.data.bot_response.map((response) => ({ ...response }))
  };
}
