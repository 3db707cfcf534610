/**
 * MongoDB ConversationBackend
 *
 * Events and flattened turns share one collection. Connection is explicit
 * (connect/close); driver errors after connecting propagate untouched so callers
 * can apply their own retry policy.
 */

import { MongoClient } from 'mongodb';
import type { Collection, Filter, IndexDescription, MongoClientOptions } from 'mongodb';

import type { ConversationBackend, DocumentCounts } from './backend.js';
import { StoreConnectionError } from './errors.js';
import { toMongoPipeline } from './event-query.js';
import type { EventQuerySpec } from './event-query.js';
import { redactMongoUri } from './tracker-config.js';
import { FLATTENED_TYPE, isFlattenedTurnDocument } from './types.js';
import type {
  ConversationDocument,
  EventPayload,
  FlattenedTurnDocument,
  FlattenedTurnQuery,
  IndexSpec
} from './types.js';

export interface MongoBackendConfig {
  uri: string;
  dbName: string;
  collection: string;
  username?: string;
  password?: string;
  /** Database holding the user's credentials */
  authSource?: string;
  serverSelectionTimeoutMs?: number;
  appName?: string;
}

interface GroupedEvents {
  sender_id: string;
  events?: EventPayload[];
  event?: EventPayload;
}

export class MongoBackend implements ConversationBackend {
  readonly kind = 'mongo' as const;

  private client: MongoClient | null = null;
  private collection: Collection<ConversationDocument> | null = null;

  constructor(private readonly config: MongoBackendConfig) {}

  async connect(): Promise<void> {
    if (this.client && this.collection) return;

    const options: MongoClientOptions = {
      appName: this.config.appName ?? 'dialogue-tracker-store',
      serverSelectionTimeoutMS: this.config.serverSelectionTimeoutMs ?? 5000
    };
    if (this.config.username) {
      options.auth = { username: this.config.username, password: this.config.password };
      options.authSource = this.config.authSource ?? 'admin';
    }

    const client = new MongoClient(this.config.uri, options);
    try {
      await client.connect();
    } catch (err) {
      await client.close().catch((closeErr: unknown) => {
        console.warn('[MongoBackend] Failed to release client after connect error:', closeErr);
      });
      // Avoid leaking credentials in errors
      const safeUri = redactMongoUri(this.config.uri);
      throw new StoreConnectionError(
        `MongoDB connection failed (${safeUri}, db=${this.config.dbName}): ${String(err)}`,
        { cause: err }
      );
    }

    this.client = client;
    this.collection = client.db(this.config.dbName).collection<ConversationDocument>(this.config.collection);
  }

  async close(): Promise<void> {
    try {
      await this.client?.close();
    } finally {
      this.client = null;
      this.collection = null;
    }
  }

  async ensureIndexes(indexes: readonly IndexSpec[]): Promise<void> {
    const descriptions: IndexDescription[] = indexes.map((index) => ({ key: { ...index.key } }));
    await this.conversations().createIndexes(descriptions);
  }

  async aggregateEvents(query: EventQuerySpec): Promise<EventPayload[]> {
    const groups = await this.conversations()
      .aggregate<GroupedEvents>(toMongoPipeline(query))
      .toArray();

    const group = groups[0];
    if (!group) return [];
    if (query.group === 'last') return group.event ? [group.event] : [];
    return group.events ?? [];
  }

  async insertMany(documents: readonly ConversationDocument[]): Promise<number> {
    if (documents.length === 0) return 0;
    // The driver assigns _id on the objects it receives; hand it copies
    const result = await this.conversations().insertMany(
      documents.map((doc) => ({ ...doc })),
      { ordered: true }
    );
    return result.insertedCount;
  }

  async rewriteSenderId(legacyId: number, senderId: string): Promise<number> {
    const result = await this.conversations().updateMany(
      { sender_id: legacyId },
      { $set: { sender_id: senderId } }
    );
    return result.modifiedCount;
  }

  async distinctSenderIds(): Promise<Array<string | number>> {
    return this.conversations().distinct('sender_id');
  }

  async findFlattenedTurns(query: FlattenedTurnQuery): Promise<FlattenedTurnDocument[]> {
    const filter: Filter<ConversationDocument> = { type: FLATTENED_TYPE };
    if (query.senderId !== undefined) filter.sender_id = query.senderId;
    if (query.since !== undefined) filter.timestamp = { $gte: query.since };

    const cursor = this.conversations()
      .find(filter, { projection: { _id: 0 } })
      .sort({ type: 1, timestamp: 1 });
    if (query.limit !== undefined) cursor.limit(query.limit);

    const turns: FlattenedTurnDocument[] = [];
    for (const doc of await cursor.toArray()) {
      if (isFlattenedTurnDocument(doc)) turns.push(doc);
    }
    return turns;
  }

  async countDocuments(): Promise<DocumentCounts> {
    const collection = this.conversations();
    const [events, flattened] = await Promise.all([
      collection.countDocuments({ type: { $ne: FLATTENED_TYPE } }),
      collection.countDocuments({ type: FLATTENED_TYPE })
    ]);
    return { events, flattened };
  }

  private conversations(): Collection<ConversationDocument> {
    if (!this.collection) throw new Error('Mongo not connected');
    return this.collection;
  }
}
