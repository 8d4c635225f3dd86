/* src/transfer/speed-tracker.spec.ts */

import { expect, test } from "@playwright/test";
import { ManualClock } from "../core/clock";
import { SpeedTracker } from "./speed-tracker";

test.describe("SpeedTracker", () => {
  test("smooths successive samples", async () => {
    const clock = new ManualClock();
    const tracker = new SpeedTracker(clock);

    await clock.advance(500);
    expect(tracker.record(1000)).toBe(2000);

    await clock.advance(1000);
    expect(tracker.record(1000)).toBeCloseTo(1700, 6);
    expect(tracker.eta(6000, 9400)).toBeCloseTo(2, 6);
  });

  test("folds same-instant chunks into the next sample", async () => {
    const clock = new ManualClock();
    const tracker = new SpeedTracker(clock);

    expect(tracker.record(4000)).toBe(0);
    await clock.advance(1000);
    expect(tracker.record(1000)).toBe(5000);
  });

  test("eta is unknown without a size or a speed", async () => {
    const clock = new ManualClock();
    const tracker = new SpeedTracker(clock);

    expect(tracker.eta(0, 1000)).toBeNull();
    await clock.advance(1000);
    tracker.record(100);
    expect(tracker.eta(0, null)).toBeNull();
    expect(tracker.eta(2000, 1000)).toBe(0);

    tracker.reset();
    expect(tracker.current).toBe(0);
  });
});
