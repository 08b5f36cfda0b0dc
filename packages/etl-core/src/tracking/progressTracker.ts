import { TrackingInputError } from "../errors";
import type { ProgressIndex } from "../types";

export interface ProgressTracker {
  setFinal: (name: string, final: number) => void;
  advance: (name: string, delta?: number) => void;
  snapshot: () => ProgressIndex[];
  isComplete: (name: string) => boolean;
  allComplete: () => boolean;
}

interface ProgressEntry {
  current: number;
  final: number;
  finalKnown: boolean;
}

function assertCount(label: string, name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new TrackingInputError(
      `${label} for ${name} must be a non-negative integer: ${value}`
    );
  }
}

function assertName(name: string): void {
  if (name.trim().length === 0) {
    throw new TrackingInputError("Progress name must not be empty");
  }
}

function entryIsComplete(entry: ProgressEntry): boolean {
  return entry.finalKnown && entry.current === entry.final;
}

/**
 * Per-relation counters. Entries keep first-seen order, so consecutive
 * snapshots list relations in the same order.
 */
export function createProgressTracker(): ProgressTracker {
  const entries = new Map<string, ProgressEntry>();

  return {
    setFinal(name: string, final: number): void {
      assertName(name);
      assertCount("Final index", name, final);

      const entry = entries.get(name);
      if (!entry) {
        entries.set(name, { current: 0, final, finalKnown: true });
        return;
      }

      entry.final = final;
      entry.finalKnown = true;
      entry.current = Math.min(entry.current, final);
    },
    advance(name: string, delta = 1): void {
      assertName(name);
      assertCount("Progress delta", name, delta);

      let entry = entries.get(name);
      if (!entry) {
        entry = { current: 0, final: 0, finalKnown: false };
        entries.set(name, entry);
      }

      const next = entry.current + delta;
      entry.current = entry.finalKnown ? Math.min(next, entry.final) : next;
    },
    snapshot(): ProgressIndex[] {
      return Array.from(entries, ([name, entry]) =>
        Object.freeze({ name, current: entry.current, final: entry.final })
      );
    },
    isComplete(name: string): boolean {
      const entry = entries.get(name);
      return entry !== undefined && entryIsComplete(entry);
    },
    allComplete(): boolean {
      if (entries.size === 0) {
        return false;
      }

      for (const entry of entries.values()) {
        if (!entryIsComplete(entry)) {
          return false;
        }
      }

      return true;
    }
  };
}
