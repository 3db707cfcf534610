/**
 * Index declarations for the conversations collection
 */

import type { ConversationBackend } from './backend.js';
import type { IndexSpec } from './types.js';

export const CONVERSATION_INDEXES: readonly IndexSpec[] = [
  // session-start lookup per conversation
  { key: { sender_id: 1, 'event.event': 1 } },
  // flattened turn analytics
  { key: { type: 1, timestamp: 1 } },
  { key: { sender_id: 1, conversation_id: 1 } },
  { key: { 'event.event': 1, 'event.timestamp': -1 } },
  { key: { 'event.name': 1, 'event.timestamp': -1 } },
  { key: { 'event.timestamp': -1 } }
];

/**
 * Default index name as MongoDB derives it, e.g. `sender_id_1_event.event_1`
 */
export function indexName(index: IndexSpec): string {
  return Object.entries(index.key)
    .map(([field, direction]) => `${field}_${direction}`)
    .join('_');
}

export class IndexManager {
  private ensured = false;

  constructor(
    private readonly backend: ConversationBackend,
    private readonly indexes: readonly IndexSpec[] = CONVERSATION_INDEXES
  ) {}

  isEnsured(): boolean {
    return this.ensured;
  }

  /**
   * Create the indexes once. Best-effort: without index privileges the store
   * still works, only slower.
   */
  async ensure(): Promise<void> {
    if (this.ensured) return;

    try {
      await this.backend.ensureIndexes(this.indexes);
    } catch (err) {
      console.warn(
        `[IndexManager] Failed to ensure indexes ${this.indexes.map(indexName).join(', ')} (continuing):`,
        err
      );
    }

    this.ensured = true;
  }
}
