/**
 * Tracker Service
 * Builds a TrackerStore from configuration
 */

import type { ConversationBackend } from '../core/backend.js';
import { MemoryBackend } from '../core/memory-backend.js';
import { MongoBackend } from '../core/mongo-backend.js';
import { loadStoreConfig } from '../core/tracker-config.js';
import type { LoadConfigOptions, StoreConfig } from '../core/tracker-config.js';
import { TrackerStore } from '../core/tracker-store.js';

export function createBackend(config: StoreConfig): ConversationBackend {
  if (config.backend === 'memory') {
    return new MemoryBackend();
  }

  return new MongoBackend({
    uri: config.mongo.uri,
    dbName: config.mongo.dbName,
    collection: config.mongo.collection,
    username: config.mongo.username,
    password: config.mongo.password,
    authSource: config.mongo.authSource,
    serverSelectionTimeoutMs: config.mongo.serverSelectionTimeoutMs
  });
}

export function createTrackerStore(config: StoreConfig): TrackerStore {
  return new TrackerStore({
    backend: createBackend(config),
    ensureIndexes: config.ensureIndexes
  });
}

export async function openTrackerStore(config: StoreConfig): Promise<TrackerStore> {
  const store = createTrackerStore(config);
  try {
    await store.initialize();
  } catch (error) {
    await store.close();
    throw error;
  }
  return store;
}

/**
 * Load config (file + environment) and open a store from it
 */
export async function openDefaultTrackerStore(options: LoadConfigOptions = {}): Promise<TrackerStore> {
  return openTrackerStore(loadStoreConfig(options));
}
