/**
 * Tests for IndexManager
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CONVERSATION_INDEXES, IndexManager, indexName } from '../src/core/index-manager.js';
import { MemoryBackend } from '../src/core/memory-backend.js';

describe('CONVERSATION_INDEXES', () => {
  it('should declare the six query indexes in key order', () => {
    expect(CONVERSATION_INDEXES.map(indexName)).toEqual([
      'sender_id_1_event.event_1',
      'type_1_timestamp_1',
      'sender_id_1_conversation_id_1',
      'event.event_1_event.timestamp_-1',
      'event.name_1_event.timestamp_-1',
      'event.timestamp_-1'
    ]);
  });
});

describe('IndexManager', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create indexes only once', async () => {
    const backend = new MemoryBackend();
    const spy = vi.spyOn(backend, 'ensureIndexes');
    const manager = new IndexManager(backend);

    await manager.ensure();
    await manager.ensure();

    expect(spy).toHaveBeenCalledTimes(1);
    expect(backend.getIndexes()).toHaveLength(6);
    expect(manager.isEnsured()).toBe(true);
  });

  it('should keep going when index creation fails', async () => {
    const backend = new MemoryBackend();
    vi.spyOn(backend, 'ensureIndexes').mockRejectedValue(new Error('not authorized'));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const manager = new IndexManager(backend);

    await expect(manager.ensure()).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(manager.isEnsured()).toBe(true);
  });
});
