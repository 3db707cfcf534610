/**
 * Save interceptors
 * Hooks around the single insert that appends one batch to a conversation.
 */

import type { EventPayload } from './types.js';

export type SaveStage = 'before' | 'after' | 'error';

/** The batch a save appends: every event shares the turn id */
export interface SaveBatch {
  senderId: string;
  turnId: string;
  events: readonly EventPayload[];
}

export interface SaveContext extends SaveBatch {
  stage: SaveStage;
  eventCount: number;
  /** Storage error, set on the `error` stage only */
  error?: unknown;
}

export type SaveInterceptor = (context: SaveContext) => Promise<void> | void;

export class SaveInterceptorRegistry {
  private readonly stages: Record<SaveStage, SaveInterceptor[]> = {
    before: [],
    after: [],
    error: []
  };

  /** Register for one stage; the returned function unregisters */
  on(stage: SaveStage, interceptor: SaveInterceptor): () => void {
    this.stages[stage] = [...this.stages[stage], interceptor];
    return () => {
      this.stages[stage] = this.stages[stage].filter((registered) => registered !== interceptor);
    };
  }

  count(stage: SaveStage): number {
    return this.stages[stage].length;
  }

  /**
   * Run in registration order and stop at the first failure, which rejects.
   * A failing `before` interceptor keeps the batch from being written.
   */
  async run(stage: SaveStage, batch: SaveBatch): Promise<void> {
    for (const interceptor of this.stages[stage]) {
      await interceptor(toContext(stage, batch));
    }
  }

  /**
   * Run every interceptor even when some fail and return the failures.
   * For stages whose batch outcome is already decided.
   */
  async settle(stage: SaveStage, batch: SaveBatch, error?: unknown): Promise<unknown[]> {
    const failures: unknown[] = [];
    for (const interceptor of this.stages[stage]) {
      try {
        await interceptor(toContext(stage, batch, error));
      } catch (failure) {
        failures.push(failure);
      }
    }
    return failures;
  }
}

function toContext(stage: SaveStage, batch: SaveBatch, error?: unknown): SaveContext {
  const context: SaveContext = {
    senderId: batch.senderId,
    turnId: batch.turnId,
    events: batch.events,
    eventCount: batch.events.length,
    stage
  };
  if (stage === 'error') context.error = error;
  return context;
}

export type BrokerMessage = EventPayload & { sender_id: string };

export interface EventBroker {
  publish(message: BrokerMessage): Promise<void> | void;
}

/**
 * After-save interceptor that streams every newly appended event to a broker,
 * tagged with its conversation key.
 */
export function streamToBroker(broker: EventBroker): SaveInterceptor {
  return async ({ senderId, events }) => {
    for (const event of events) {
      await broker.publish({ ...event, sender_id: senderId });
    }
  };
}
