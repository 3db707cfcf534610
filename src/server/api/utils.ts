/**
 * API Utilities
 * Shared helpers for API endpoints
 */

import type { TrackerStore } from '../../core/tracker-store.js';

export type AppEnv = {
  Variables: {
    store: TrackerStore;
  };
};

/**
 * Parse an optional numeric query parameter.
 * Returns undefined when absent, null when present but not a finite number.
 */
export function parseNumberParam(value: string | undefined): number | undefined | null {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function isValidLimit(limit: number | undefined): boolean {
  return limit === undefined || (Number.isInteger(limit) && limit > 0);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
