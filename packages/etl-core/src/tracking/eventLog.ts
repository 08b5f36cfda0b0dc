import { TrackingInputError } from "../errors";
import type { EventRecord } from "../types";

export const DEFAULT_EVENT_LOG_CAPACITY = 1000;

export interface EventLogOptions {
  capacity?: number;
  now?: () => number;
}

export interface EventLog {
  append: (target: string, step: string, event: string) => EventRecord;
  recent: (limit?: number) => EventRecord[];
  size: () => number;
}

function assertLabel(label: string, value: string): void {
  if (value.trim().length === 0) {
    throw new TrackingInputError(`Event ${label} must not be empty`);
  }
}

function pairKey(target: string, step: string): string {
  return JSON.stringify([target, step]);
}

/**
 * Append-only log of lifecycle events held in a ring buffer. Timestamps never
 * go backwards, so arrival order and timestamp order agree.
 */
export function createEventLog(options: EventLogOptions = {}): EventLog {
  const now = options.now ?? Date.now;
  const capacity = Math.max(1, options.capacity ?? DEFAULT_EVENT_LOG_CAPACITY);

  const buffer: Array<EventRecord | undefined> = new Array<EventRecord | undefined>(capacity);
  // One entry per (target, step) pair ever seen, kept past eviction so elapsed
  // stays correct; bounded by relations times pipeline steps.
  const lastSeenMs = new Map<string, number>();
  let start = 0;
  let count = 0;
  let latestMs = Number.NEGATIVE_INFINITY;

  const recordAt = (offset: number): EventRecord => {
    const record = buffer[(start + offset) % capacity];
    if (!record) {
      throw new Error(`Event log slot ${offset} is empty`);
    }
    return record;
  };

  return {
    append(target: string, step: string, event: string): EventRecord {
      assertLabel("target", target);
      assertLabel("step", step);
      assertLabel("event", event);

      const timestampMs = Math.max(now(), latestMs);
      const key = pairKey(target, step);
      const previousMs = lastSeenMs.get(key);
      const elapsed = previousMs === undefined ? 0 : (timestampMs - previousMs) / 1000;

      const record: EventRecord = Object.freeze({
        target,
        step,
        event,
        timestamp: new Date(timestampMs).toISOString(),
        elapsed
      });

      if (count < capacity) {
        buffer[(start + count) % capacity] = record;
        count += 1;
      } else {
        buffer[start] = record;
        start = (start + 1) % capacity;
      }

      latestMs = timestampMs;
      lastSeenMs.set(key, timestampMs);

      return record;
    },
    recent(limit?: number): EventRecord[] {
      const take = limit === undefined ? count : Math.min(count, Math.max(0, Math.floor(limit)));
      const records: EventRecord[] = [];

      for (let offset = count - take; offset < count; offset += 1) {
        records.push(recordAt(offset));
      }

      return records;
    },
    size(): number {
      return count;
    }
  };
}
