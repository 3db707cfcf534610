/**
 * Incremental Writer
 *
 * Appends only the part of a conversation's history that is not yet durable.
 * The suffix is found by length: whatever the store already returns for the
 * conversation is assumed to be a prefix of the supplied history.
 *
 * Preconditions (not enforced here):
 * - the dialogue engine always passes the full history, append-only, never reordered
 * - one writer per conversation at a time; concurrent writers for the same key
 *   can drop or duplicate events. Serialize per conversation in the caller.
 */

import { randomUUID } from 'crypto';

import type { ConversationBackend } from './backend.js';
import { InvalidEventError } from './errors.js';
import type { EventReader } from './event-reader.js';
import { materializeFlattenedTurn } from './flattened-view.js';
import { SaveInterceptorRegistry } from './save-interceptor.js';
import type { SaveBatch, SaveStage } from './save-interceptor.js';
import { FULL_HISTORY } from './session-resolver.js';
import { EventPayloadSchema } from './types.js';
import type { ConversationDocument, EventPayload, SaveResult } from './types.js';

export interface IncrementalWriterOptions {
  generateTurnId?: () => string;
  interceptors?: SaveInterceptorRegistry;
}

export function generateTurnId(): string {
  return randomUUID().replace(/-/g, '');
}

export function validateEvents(events: readonly unknown[]): EventPayload[] {
  return events.map((event, index) => {
    const parsed = EventPayloadSchema.safeParse(event);
    if (!parsed.success) {
      throw new InvalidEventError(
        index,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(event)'}: ${issue.message}`)
      );
    }
    return parsed.data;
  });
}

export class IncrementalWriter {
  private readonly nextTurnId: () => string;
  readonly interceptors: SaveInterceptorRegistry;

  constructor(
    private readonly backend: ConversationBackend,
    private readonly reader: EventReader,
    options: IncrementalWriterOptions = {}
  ) {
    this.nextTurnId = options.generateTurnId ?? generateTurnId;
    this.interceptors = options.interceptors ?? new SaveInterceptorRegistry();
  }

  async save(senderId: string, fullEvents: readonly unknown[]): Promise<SaveResult> {
    const events = validateEvents(fullEvents);

    const stored = await this.reader.read(senderId, FULL_HISTORY);
    const persistedBefore = stored?.length ?? 0;

    if (persistedBefore > events.length) {
      console.warn(
        `[IncrementalWriter] ${senderId}: ${persistedBefore} events stored but only ${events.length} supplied; nothing appended`
      );
    }

    const suffix = events.slice(persistedBefore);
    if (suffix.length === 0) {
      return { senderId, persistedBefore, appended: [], turnId: null, flattened: null };
    }

    const turnId = this.nextTurnId();
    const documents: ConversationDocument[] = suffix.map((event) => ({
      sender_id: senderId,
      conversation_id: turnId,
      event
    }));

    const flattened = materializeFlattenedTurn(senderId, suffix, turnId);
    if (flattened) documents.push(flattened);

    const batch: SaveBatch = { senderId, turnId, events: suffix };
    await this.interceptors.run('before', batch);

    try {
      await this.backend.insertMany(documents);
    } catch (error) {
      this.reportInterceptorFailures('error', batch, await this.interceptors.settle('error', batch, error));
      throw error;
    }

    // The batch is durable from here on; hook failures no longer fail the save
    this.reportInterceptorFailures('after', batch, await this.interceptors.settle('after', batch));

    return { senderId, persistedBefore, appended: suffix, turnId, flattened };
  }

  private reportInterceptorFailures(stage: SaveStage, batch: SaveBatch, failures: unknown[]): void {
    const outcome = stage === 'after' ? 'stored' : 'not stored';
    for (const failure of failures) {
      console.warn(
        `[IncrementalWriter] ${stage} interceptor failed for ${batch.senderId} (turn ${batch.turnId}, ${batch.events.length} events ${outcome}):`,
        failure
      );
    }
  }
}
