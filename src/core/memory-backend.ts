/**
 * In-process ConversationBackend.
 * Evaluates the same query specs as MongoDB; used for tests and local runs.
 */

import type { ConversationBackend, DocumentCounts } from './backend.js';
import { matchesEventFilter } from './event-query.js';
import type { EventQuerySpec } from './event-query.js';
import { isFlattenedTurnDocument } from './types.js';
import type {
  ConversationDocument,
  EventPayload,
  FlattenedTurnDocument,
  FlattenedTurnQuery,
  IndexSpec,
  StoredEventDocument
} from './types.js';

export class MemoryBackend implements ConversationBackend {
  readonly kind = 'memory' as const;

  private documents: ConversationDocument[] = [];
  private readonly indexes: IndexSpec[] = [];
  private connected = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async ensureIndexes(indexes: readonly IndexSpec[]): Promise<void> {
    for (const index of indexes) {
      const signature = JSON.stringify(index.key);
      if (!this.indexes.some((existing) => JSON.stringify(existing.key) === signature)) {
        this.indexes.push(structuredClone(index));
      }
    }
  }

  getIndexes(): IndexSpec[] {
    return structuredClone(this.indexes);
  }

  async aggregateEvents(query: EventQuerySpec): Promise<EventPayload[]> {
    const matched = this.documents
      .filter((doc): doc is StoredEventDocument => !isFlattenedTurnDocument(doc))
      .filter((doc) => matchesEventFilter(doc, query.filter));

    // Array.prototype.sort is stable, so equal timestamps keep insertion order
    matched.sort((a, b) => (a.event.timestamp - b.event.timestamp) * query.sort);

    const events = matched.map((doc) => structuredClone(doc.event));
    if (query.group === 'last') {
      return events.length > 0 ? [events[events.length - 1]] : [];
    }
    return events;
  }

  async insertMany(documents: readonly ConversationDocument[]): Promise<number> {
    this.documents.push(...documents.map((doc) => structuredClone(doc)));
    return documents.length;
  }

  async rewriteSenderId(legacyId: number, senderId: string): Promise<number> {
    let rewritten = 0;
    this.documents = this.documents.map((doc) => {
      if (doc.sender_id !== legacyId) return doc;
      rewritten++;
      return { ...doc, sender_id: senderId };
    });
    return rewritten;
  }

  async distinctSenderIds(): Promise<Array<string | number>> {
    return [...new Set(this.documents.map((doc) => doc.sender_id))];
  }

  async findFlattenedTurns(query: FlattenedTurnQuery): Promise<FlattenedTurnDocument[]> {
    const since = query.since;
    const turns = this.documents
      .filter(isFlattenedTurnDocument)
      .filter((doc) => query.senderId === undefined || doc.sender_id === query.senderId)
      .filter((doc) => since === undefined || (doc.timestamp !== null && doc.timestamp >= since));

    // Mongo sorts null before numbers in ascending order
    turns.sort((a, b) => (a.timestamp ?? -Infinity) - (b.timestamp ?? -Infinity));

    const limited = query.limit !== undefined ? turns.slice(0, query.limit) : turns;
    return limited.map((doc) => structuredClone(doc));
  }

  async countDocuments(): Promise<DocumentCounts> {
    const flattened = this.documents.filter(isFlattenedTurnDocument).length;
    return { events: this.documents.length - flattened, flattened };
  }
}
