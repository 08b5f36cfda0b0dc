import { randomUUID } from "node:crypto";

import { createEventLog, type EventLog } from "./eventLog";
import { createProgressTracker, type ProgressTracker } from "./progressTracker";

export interface RunStateOptions {
  etlId?: string | null;
  eventCapacity?: number;
  now?: () => number;
}

export interface RunState {
  etlId: string;
  progress: ProgressTracker;
  events: EventLog;
}

export function createRunState(options: RunStateOptions = {}): RunState {
  return {
    etlId: options.etlId ?? randomUUID(),
    progress: createProgressTracker(),
    events: createEventLog({
      capacity: options.eventCapacity,
      now: options.now
    })
  };
}
