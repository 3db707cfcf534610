/**
 * Error taxonomy for the tracker store.
 * Absence on the ordinary read path is `null`, not an error.
 */

export class TrackerStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConversationNotFoundError extends TrackerStoreError {
  constructor(readonly senderId: string) {
    super(`No conversation stored under "${senderId}"`);
  }
}

export class InvalidEventError extends TrackerStoreError {
  constructor(readonly index: number, readonly issues: string[]) {
    super(`Invalid event at position ${index}: ${issues.join('; ')}`);
  }
}

export class StoreClosedError extends TrackerStoreError {
  constructor() {
    super('Tracker store is closed');
  }
}

export class StoreConnectionError extends TrackerStoreError {}

export class ConfigError extends TrackerStoreError {
  constructor(readonly issues: string[]) {
    super(`Invalid tracker store config: ${issues.join('; ')}`);
  }
}
