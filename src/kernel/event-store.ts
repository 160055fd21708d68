/**
 * Event Store - append-only run log. Each event's hash covers its content
 * and the previous event's hash, so editing any stored event breaks the chain
 * from that point on.
 */

import { canonicalJson, GENESIS_HASH, sha256 } from '../utils/hash.js';
import type { Event, EventPayload, EventType } from '../types/domain.js';

/** Caller-supplied fields; the store assigns id, sequence and hashes. */
export type EventData = {
  [T in EventType]: {
    runId: string;
    tickId: number;
    eventType: T;
    traderId: string | null;
    payload: EventPayload<T>;
  };
}[EventType];

export type ChainVerification = { valid: true } | { valid: false; errorAt: number };

export interface EventStore {
  append(data: EventData): Event;
  getAll(): Event[];
  getByType<T extends EventType>(eventType: T): Extract<Event, { eventType: T }>[];
  getLastHash(): string;
  getCount(): number;
  /** One JSON object per line */
  exportJsonl(): string;
  /** Recompute every link; reports the index of the first broken event */
  verifyChain(): ChainVerification;
}

function linkHash(event: EventData, eventSeq: number, prevHash: string): string {
  const { runId, tickId, eventType, traderId, payload } = event;
  return sha256(canonicalJson({ runId, tickId, eventSeq, eventType, traderId, payload, prevHash }));
}

/**
 * Create an in-memory event store for one run.
 */
export function createEventStore(): EventStore {
  const events: Event[] = [];

  function getLastHash(): string {
    return events[events.length - 1]?.eventHash ?? GENESIS_HASH;
  }

  function append(data: EventData): Event {
    const eventSeq = events.length;
    const prevHash = getLastHash();
    const event: Event = {
      ...data,
      id: eventSeq + 1,
      eventSeq,
      prevHash,
      eventHash: linkHash(data, eventSeq, prevHash),
    };

    events.push(event);
    return event;
  }

  function getByType<T extends EventType>(eventType: T): Extract<Event, { eventType: T }>[] {
    return events.filter((event): event is Extract<Event, { eventType: T }> => event.eventType === eventType);
  }

  function verifyChain(): ChainVerification {
    let expectedPrev = GENESIS_HASH;

    for (const [index, event] of events.entries()) {
      if (event.prevHash !== expectedPrev || event.eventHash !== linkHash(event, event.eventSeq, expectedPrev)) {
        return { valid: false, errorAt: index };
      }
      expectedPrev = event.eventHash;
    }

    return { valid: true };
  }

  return {
    append,
    getAll: () => [...events],
    getByType,
    getLastHash,
    getCount: () => events.length,
    exportJsonl: () => events.map((event) => JSON.stringify(event)).join('\n'),
    verifyChain,
  };
}
