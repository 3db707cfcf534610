/**
 * Event Query Builder
 *
 * One composable filter -> sort -> group description shared by the session
 * resolver and the event reader. Backends interpret it: MongoDB compiles it to
 * an aggregation pipeline, the in-memory backend evaluates it directly.
 */

import type { Document } from 'mongodb';

import { FLATTENED_TYPE } from './types.js';
import type { StoredEventDocument } from './types.js';

export type SortDirection = 1 | -1;

export type EventTypeCondition =
  | { op: 'eq'; value: string }
  | { op: 'ne'; value: string };

export interface EventFilter {
  senderId: string;
  eventType?: EventTypeCondition;
  /** Inclusive lower bound on event.timestamp */
  since?: number;
}

/** `push` collects every matching event, `last` keeps only the final one after sorting */
export type EventGrouping = 'push' | 'last';

export interface EventQuerySpec {
  filter: EventFilter;
  sort: SortDirection;
  group: EventGrouping;
}

export class EventQuery {
  private constructor(private readonly spec: EventQuerySpec) {}

  static forConversation(senderId: string): EventQuery {
    return new EventQuery({
      filter: { senderId },
      sort: 1,
      group: 'push'
    });
  }

  ofType(eventType: string): EventQuery {
    return this.withFilter({ eventType: { op: 'eq', value: eventType } });
  }

  excluding(eventType: string): EventQuery {
    return this.withFilter({ eventType: { op: 'ne', value: eventType } });
  }

  since(timestamp: number): EventQuery {
    return this.withFilter({ since: timestamp });
  }

  sorted(direction: SortDirection): EventQuery {
    return new EventQuery({ ...this.spec, sort: direction });
  }

  collectAll(): EventQuery {
    return new EventQuery({ ...this.spec, group: 'push' });
  }

  lastOnly(): EventQuery {
    return new EventQuery({ ...this.spec, group: 'last' });
  }

  build(): EventQuerySpec {
    return {
      filter: { ...this.spec.filter },
      sort: this.spec.sort,
      group: this.spec.group
    };
  }

  private withFilter(patch: Partial<EventFilter>): EventQuery {
    return new EventQuery({
      ...this.spec,
      filter: { ...this.spec.filter, ...patch }
    });
  }
}

export function toMongoMatch(filter: EventFilter): Document {
  const match: Document = {
    sender_id: filter.senderId,
    type: { $ne: FLATTENED_TYPE }
  };

  if (filter.eventType) {
    match['event.event'] = filter.eventType.op === 'eq'
      ? filter.eventType.value
      : { $ne: filter.eventType.value };
  }

  if (filter.since !== undefined) {
    match['event.timestamp'] = { $gte: filter.since };
  }

  return match;
}

/**
 * Compile a query into an aggregation pipeline.
 * Ties on timestamp fall back to _id, which follows insertion order within a batch.
 */
export function toMongoPipeline(spec: EventQuerySpec): Document[] {
  const accumulator = spec.group === 'push'
    ? { events: { $push: '$event' } }
    : { event: { $last: '$event' } };

  return [
    { $match: toMongoMatch(spec.filter) },
    { $sort: { 'event.timestamp': spec.sort, _id: spec.sort } },
    { $group: { _id: '$sender_id', ...accumulator } },
    {
      $project: spec.group === 'push'
        ? { _id: 0, sender_id: '$_id', events: 1 }
        : { _id: 0, sender_id: '$_id', event: 1 }
    }
  ];
}

/**
 * In-process evaluation of the same filter. The sender id comparison is strict,
 * so a string key never matches a legacy integer record.
 */
export function matchesEventFilter(doc: StoredEventDocument, filter: EventFilter): boolean {
  if (doc.sender_id !== filter.senderId) return false;

  if (filter.eventType) {
    const sameType = doc.event.event === filter.eventType.value;
    if (filter.eventType.op === 'eq' ? !sameType : sameType) return false;
  }

  if (filter.since !== undefined && !(doc.event.timestamp >= filter.since)) {
    return false;
  }

  return true;
}
