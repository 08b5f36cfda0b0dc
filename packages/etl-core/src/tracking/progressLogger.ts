import type { ProgressTracker } from "./progressTracker";

export interface ProgressLoggerOptions {
  tracker: ProgressTracker;
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  tick: () => void;
  flush: () => void;
}

export function createProgressLogger(
  options: ProgressLoggerOptions
): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  let lastLoggedAtMs = now();

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const snapshot = options.tracker.snapshot();
    let current = 0;
    let final = 0;
    let complete = 0;

    for (const index of snapshot) {
      current += index.current;
      final += index.final;
      if (options.tracker.isComplete(index.name)) {
        complete += 1;
      }
    }

    log(
      `etl progress (relations=${snapshot.length}, complete=${complete}, units=${current}/${final})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    tick(): void {
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
