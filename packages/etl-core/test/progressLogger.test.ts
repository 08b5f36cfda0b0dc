import { describe, expect, it } from "vitest";

import { createProgressLogger } from "../src/tracking/progressLogger";
import { createProgressTracker } from "../src/tracking/progressTracker";

describe("createProgressLogger", () => {
  it("logs at configured intervals using aggregated counters", () => {
    let nowMs = 0;
    const messages: string[] = [];
    const tracker = createProgressTracker();

    const logger = createProgressLogger({
      tracker,
      intervalMs: 1000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    tracker.setFinal("public.orders", 4);
    tracker.advance("public.orders", 4);
    logger.tick();
    expect(messages).toHaveLength(0);

    nowMs = 1000;
    tracker.setFinal("public.customers", 6);
    tracker.advance("public.customers", 2);
    logger.tick();

    expect(messages).toEqual(["etl progress (relations=2, complete=1, units=6/10)"]);
  });

  it("flushes a final progress line on demand", () => {
    let nowMs = 0;
    const messages: string[] = [];
    const tracker = createProgressTracker();

    const logger = createProgressLogger({
      tracker,
      intervalMs: 5000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    nowMs = 250;
    logger.flush();

    expect(messages).toEqual(["etl progress (relations=0, complete=0, units=0/0)"]);
  });
});
