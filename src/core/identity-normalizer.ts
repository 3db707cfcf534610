/**
 * Identity Normalizer
 *
 * Older writers stored numeric sender ids as integers. The first read that misses
 * under the string key rewrites those records in place; nothing happens on write.
 */

import type { ConversationBackend } from './backend.js';
import { toLegacyNumericKey } from './conversation-key.js';

export interface KeyResolution {
  key: string;
  /** Integer form that was looked up, null for non-numeric keys */
  legacyId: number | null;
  rewritten: number;
}

export class IdentityNormalizer {
  constructor(private readonly backend: ConversationBackend) {}

  /**
   * Call after a read under the string key came back empty.
   * Zero rewritten records is a normal outcome, not an error.
   */
  async resolve(senderId: string): Promise<KeyResolution> {
    const legacyId = toLegacyNumericKey(senderId);
    if (legacyId === null) {
      return { key: senderId, legacyId: null, rewritten: 0 };
    }

    const rewritten = await this.backend.rewriteSenderId(legacyId, senderId);
    return { key: senderId, legacyId, rewritten };
  }
}
