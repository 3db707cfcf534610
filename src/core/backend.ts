/**
 * Storage port for the tracker store.
 * All documents of one conversation live in a single collection.
 */

import type { EventQuerySpec } from './event-query.js';
import type {
  ConversationDocument,
  EventPayload,
  FlattenedTurnDocument,
  FlattenedTurnQuery,
  IndexSpec
} from './types.js';

export interface DocumentCounts {
  events: number;
  flattened: number;
}

export interface ConversationBackend {
  readonly kind: 'mongo' | 'memory';

  connect(): Promise<void>;
  close(): Promise<void>;

  ensureIndexes(indexes: readonly IndexSpec[]): Promise<void>;

  /**
   * Run a grouped event query for one conversation.
   * Returns the grouped events in sort order, or an empty list when nothing matched.
   */
  aggregateEvents(query: EventQuerySpec): Promise<EventPayload[]>;

  /** Append documents as a single batch write; resolves to the inserted count */
  insertMany(documents: readonly ConversationDocument[]): Promise<number>;

  /** Rewrite every record stored under the integer key to the string key */
  rewriteSenderId(legacyId: number, senderId: string): Promise<number>;

  distinctSenderIds(): Promise<Array<string | number>>;

  findFlattenedTurns(query: FlattenedTurnQuery): Promise<FlattenedTurnDocument[]>;

  countDocuments(): Promise<DocumentCounts>;
}
