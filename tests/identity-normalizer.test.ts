/**
 * Tests for IdentityNormalizer
 */

import { describe, it, expect, vi } from 'vitest';
import { IdentityNormalizer } from '../src/core/identity-normalizer.js';
import { MemoryBackend } from '../src/core/memory-backend.js';
import { userEvent } from './helpers.js';

describe('IdentityNormalizer', () => {
  it('should skip keys that are not numeric', async () => {
    const backend = new MemoryBackend();
    const spy = vi.spyOn(backend, 'rewriteSenderId');
    const normalizer = new IdentityNormalizer(backend);

    await expect(normalizer.resolve('user-7')).resolves.toEqual({
      key: 'user-7',
      legacyId: null,
      rewritten: 0
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('should rewrite integer-keyed records to the string key', async () => {
    const backend = new MemoryBackend();
    await backend.insertMany([
      { sender_id: 42, conversation_id: 'c1', event: userEvent(1, 'a') },
      { sender_id: 42, conversation_id: 'c1', event: userEvent(2, 'b') },
      { sender_id: 7, conversation_id: 'c2', event: userEvent(3, 'c') }
    ]);
    const normalizer = new IdentityNormalizer(backend);

    await expect(normalizer.resolve('42')).resolves.toEqual({
      key: '42',
      legacyId: 42,
      rewritten: 2
    });
    expect(await backend.distinctSenderIds()).toEqual(['42', 7]);
  });

  it('should report zero when there is nothing to migrate', async () => {
    const normalizer = new IdentityNormalizer(new MemoryBackend());

    await expect(normalizer.resolve('42')).resolves.toEqual({
      key: '42',
      legacyId: 42,
      rewritten: 0
    });
  });
});
