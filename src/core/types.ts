/**
 * Core types for the dialogue tracker store
 * Event payloads stay opaque except for the tags the store windows and summarizes on
 */

import { z } from 'zod';

// ============================================================
// Event Payload (opaque, as produced by the dialogue engine)
// ============================================================

export const EventPayloadSchema = z.object({
  event: z.string().min(1),
  timestamp: z.number().finite()
}).passthrough();
export type EventPayload = z.infer<typeof EventPayloadSchema>;

export const SESSION_STARTED = 'session_started';
export const FLATTENED_TYPE = 'flattened';

// ============================================================
// Inspected Event Kinds
// ============================================================

// Field readers: a value of the wrong type reads as null instead of failing the event
const nullableString = z.string().nullable().catch(null);
const nullableNumber = z.number().nullable().catch(null);

const UserFieldsSchema = z.object({
  text: nullableString,
  parse_data: z.object({
    intent: z.object({
      name: nullableString,
      confidence: nullableNumber
    }).nullable().catch(null)
  }).nullable().catch(null)
});

const ActionFieldsSchema = z.object({
  name: nullableString
});

const BotFieldsSchema = z.object({
  text: nullableString,
  data: z.unknown()
});

export type ClassifiedEvent =
  | {
      kind: 'user';
      payload: EventPayload;
      text: string | null;
      intentName: string | null;
      confidence: number | null;
    }
  | { kind: 'action'; payload: EventPayload; name: string | null }
  | { kind: 'bot'; payload: EventPayload; text: string | null; data: unknown }
  | { kind: 'session_started'; payload: EventPayload }
  | { kind: 'other'; payload: EventPayload };

/**
 * Narrow a payload by its `event` tag alone.
 * The fields the store summarizes are read leniently and default to null.
 */
export function classifyEvent(payload: EventPayload): ClassifiedEvent {
  switch (payload.event) {
    case 'user': {
      const fields = UserFieldsSchema.parse(payload);
      const intent = fields.parse_data?.intent ?? null;
      return {
        kind: 'user',
        payload,
        text: fields.text,
        intentName: intent?.name ?? null,
        confidence: intent?.confidence ?? null
      };
    }
    case 'action':
      return { kind: 'action', payload, name: ActionFieldsSchema.parse(payload).name };
    case 'bot': {
      const fields = BotFieldsSchema.parse(payload);
      return { kind: 'bot', payload, text: fields.text, data: fields.data ?? null };
    }
    case SESSION_STARTED:
      return { kind: 'session_started', payload };
    default:
      return { kind: 'other', payload };
  }
}

// ============================================================
// Persisted Documents
// ============================================================

/** Legacy records may still carry an integer sender_id */
export type StoredSenderId = string | number;

export interface StoredEventDocument {
  sender_id: StoredSenderId;
  conversation_id: string;
  event: EventPayload;
}

export interface BotResponse {
  text: string | null;
  data: unknown;
}

export interface FlattenedTurnData {
  user_input: string | null;
  intent: string | null;
  confidence: number | null;
  /** Action names in encounter order; null for an action without a name */
  action: Array<string | null>;
  bot_response: BotResponse[];
}

export interface FlattenedTurnDocument {
  type: typeof FLATTENED_TYPE;
  sender_id: StoredSenderId;
  conversation_id: string;
  timestamp: number | null;
  data: FlattenedTurnData;
}

export type ConversationDocument = StoredEventDocument | FlattenedTurnDocument;

export function isFlattenedTurnDocument(doc: ConversationDocument): doc is FlattenedTurnDocument {
  return 'type' in doc && doc.type === FLATTENED_TYPE;
}

// ============================================================
// Domain Views
// ============================================================

export interface FlattenedTurn {
  conversationKey: string;
  turnId: string;
  timestamp: number | null;
  userInput: string | null;
  intentName: string | null;
  intentConfidence: number | null;
  actionNames: Array<string | null>;
  botResponses: BotResponse[];
}

export interface FlattenedTurnQuery {
  senderId?: string;
  /** Inclusive lower bound on the turn timestamp */
  since?: number;
  limit?: number;
}

/**
 * Hand-off shape between the dialogue engine and the store.
 * `events` is always the full, ordered history of the conversation.
 */
export interface DialogueTracker {
  senderId: string;
  events: readonly EventPayload[];
}

/** What the store accepts on save; events are validated before anything is written */
export interface TrackerInput {
  senderId: string;
  events: readonly unknown[];
}

export interface SaveResult {
  senderId: string;
  /** Events already durable before this save */
  persistedBefore: number;
  appended: EventPayload[];
  /** Shared conversation_id of the batch, null when nothing was appended */
  turnId: string | null;
  flattened: FlattenedTurnDocument | null;
}

export interface StoreStats {
  conversations: number;
  events: number;
  flattenedTurns: number;
}

// ============================================================
// Index Declarations
// ============================================================

export type IndexDirection = 1 | -1;

export interface IndexSpec {
  /** Ordered key paths; insertion order is the index key order */
  key: Record<string, IndexDirection>;
}
