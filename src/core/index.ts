/**
 * Core module exports
 */

// Types
export * from './types.js';
export * from './errors.js';

// Identity
export * from './conversation-key.js';
export * from './identity-normalizer.js';

// Querying
export * from './event-query.js';
export * from './session-resolver.js';
export * from './event-reader.js';

// Writing
export * from './flattened-view.js';
export * from './incremental-writer.js';
export * from './save-interceptor.js';

// Storage
export * from './backend.js';
export * from './index-manager.js';
export * from './memory-backend.js';
export * from './mongo-backend.js';

// Store
export * from './tracker-config.js';
export * from './tracker-store.js';
