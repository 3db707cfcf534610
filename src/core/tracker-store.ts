/**
 * Tracker Store
 *
 * Persists dialogue event histories and reconstructs them on demand.
 * One instance owns one backend connection; open it, share it, close it.
 */

import type { ConversationBackend } from './backend.js';
import { normalizeSenderId } from './conversation-key.js';
import { ConversationNotFoundError, StoreClosedError } from './errors.js';
import { EventReader } from './event-reader.js';
import type { EventSequence } from './event-reader.js';
import { toFlattenedTurn } from './flattened-view.js';
import { IdentityNormalizer } from './identity-normalizer.js';
import { IncrementalWriter } from './incremental-writer.js';
import { IndexManager } from './index-manager.js';
import { SaveInterceptorRegistry } from './save-interceptor.js';
import type { SaveInterceptor } from './save-interceptor.js';
import { SessionResolver } from './session-resolver.js';
import type {
  DialogueTracker,
  FlattenedTurn,
  FlattenedTurnQuery,
  SaveResult,
  StoreStats,
  TrackerInput
} from './types.js';

export interface TrackerStoreOptions {
  backend: ConversationBackend;
  /** Create the query indexes on initialize (default true) */
  ensureIndexes?: boolean;
  generateTurnId?: () => string;
}

export interface RetrieveOptions {
  /** Entire history instead of the current session only */
  full?: boolean;
}

export class TrackerStore {
  private readonly backend: ConversationBackend;
  private readonly indexManager: IndexManager;
  private readonly identity: IdentityNormalizer;
  private readonly sessions: SessionResolver;
  private readonly reader: EventReader;
  private readonly writer: IncrementalWriter;
  private readonly interceptors = new SaveInterceptorRegistry();
  private readonly ensureIndexesOnInit: boolean;

  private initializing: Promise<void> | null = null;
  private closed = false;

  constructor(options: TrackerStoreOptions) {
    this.backend = options.backend;
    this.ensureIndexesOnInit = options.ensureIndexes ?? true;
    this.indexManager = new IndexManager(this.backend);
    this.identity = new IdentityNormalizer(this.backend);
    this.sessions = new SessionResolver(this.backend);
    this.reader = new EventReader(this.backend);
    this.writer = new IncrementalWriter(this.backend, this.reader, {
      generateTurnId: options.generateTurnId,
      interceptors: this.interceptors
    });
  }

  static async open(options: TrackerStoreOptions): Promise<TrackerStore> {
    const store = new TrackerStore(options);
    await store.initialize();
    return store;
  }

  /**
   * Connect and ensure indexes. Safe to call repeatedly; every operation calls it.
   */
  async initialize(): Promise<void> {
    if (this.closed) throw new StoreClosedError();

    if (!this.initializing) {
      this.initializing = this.connectAndIndex();
      // A failed attempt may be retried by the next call
      this.initializing.catch(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.initializing = null;
    await this.backend.close();
  }

  isClosed(): boolean {
    return this.closed;
  }

  get backendKind(): ConversationBackend['kind'] {
    return this.backend.kind;
  }

  // ============================================================
  // Write path
  // ============================================================

  async save(tracker: TrackerInput): Promise<SaveResult> {
    await this.initialize();
    return this.writer.save(tracker.senderId, tracker.events);
  }

  /** Runs before the insert; throwing rejects the save and nothing is written */
  onBeforeSave(interceptor: SaveInterceptor): () => void {
    return this.interceptors.on('before', interceptor);
  }

  /**
   * Runs after the batch is stored. A failure is logged and does not reject
   * the save, since the events are already durable.
   */
  onAfterSave(interceptor: SaveInterceptor): () => void {
    return this.interceptors.on('after', interceptor);
  }

  /** Sees the storage error of a failed insert; the save still rejects with it */
  onSaveError(interceptor: SaveInterceptor): () => void {
    return this.interceptors.on('error', interceptor);
  }

  // ============================================================
  // Read path
  // ============================================================

  /** Current session only; null when nothing is stored under the key */
  async retrieve(senderId: string): Promise<DialogueTracker | null> {
    return this.toTracker(senderId, await this.readEvents(senderId, true));
  }

  /** Entire history across sessions; null when nothing is stored under the key */
  async retrieveFull(senderId: string): Promise<DialogueTracker | null> {
    return this.toTracker(senderId, await this.readEvents(senderId, false));
  }

  /**
   * Like retrieve/retrieveFull, for callers that need a reconstruction:
   * absence rejects with ConversationNotFoundError.
   */
  async require(senderId: string, options: RetrieveOptions = {}): Promise<DialogueTracker> {
    const tracker = options.full
      ? await this.retrieveFull(senderId)
      : await this.retrieve(senderId);
    if (!tracker) throw new ConversationNotFoundError(senderId);
    return tracker;
  }

  async keys(): Promise<string[]> {
    await this.initialize();
    const ids = await this.backend.distinctSenderIds();
    return [...new Set(ids.map(normalizeSenderId))];
  }

  async getFlattenedTurns(query: FlattenedTurnQuery = {}): Promise<FlattenedTurn[]> {
    await this.initialize();
    const docs = await this.backend.findFlattenedTurns(query);
    return docs.map(toFlattenedTurn);
  }

  async getStats(): Promise<StoreStats> {
    await this.initialize();
    const [counts, keys] = await Promise.all([
      this.backend.countDocuments(),
      this.keys()
    ]);
    return {
      conversations: keys.length,
      events: counts.events,
      flattenedTurns: counts.flattened
    };
  }

  private async readEvents(senderId: string, currentSessionOnly: boolean): Promise<EventSequence | null> {
    await this.initialize();

    const stored = await this.readWindow(senderId, currentSessionOnly);
    if (stored) return stored;

    // Conversations written with an integer sender_id are moved to the string key
    const resolution = await this.identity.resolve(senderId);
    if (resolution.rewritten === 0) return null;

    console.warn(
      `[TrackerStore] Migrated ${resolution.rewritten} legacy records from ${resolution.legacyId} to "${resolution.key}"`
    );
    return this.readWindow(resolution.key, currentSessionOnly);
  }

  private async readWindow(senderId: string, currentSessionOnly: boolean): Promise<EventSequence | null> {
    const window = await this.sessions.resolveWindow(senderId, currentSessionOnly);
    return this.reader.read(senderId, window);
  }

  private toTracker(senderId: string, events: EventSequence | null): DialogueTracker | null {
    if (!events) return null;
    return { senderId, events: events.toArray() };
  }

  private async connectAndIndex(): Promise<void> {
    await this.backend.connect();
    if (this.ensureIndexesOnInit) {
      await this.indexManager.ensure();
    }
  }
}
