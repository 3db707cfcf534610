/**
 * Import file format for `tracker-store import`:
 * one `{ sender_id, events }` object or an array of them.
 */

import * as fs from 'fs';
import { z } from 'zod';

import type { TrackerInput } from '../core/types.js';

const ImportEntrySchema = z.object({
  sender_id: z.union([z.string().min(1), z.number().int().nonnegative()]),
  events: z.array(z.unknown())
});

const ImportFileSchema = z.union([ImportEntrySchema, z.array(ImportEntrySchema)]);

export function parseImportFile(raw: unknown): TrackerInput[] {
  const parsed = ImportFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid import file: ${issues.join('; ')}`);
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return entries.map((entry) => ({
    senderId: String(entry.sender_id),
    events: entry.events
  }));
}

export function readImportFile(filePath: string): TrackerInput[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseImportFile(raw);
}
