import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { IntervalTickSource } from "../src/adapters/IntervalTickSource.js";
import { TimerScheduler } from "../src/core.js";
import { createSilentLogger } from "./support/testContext.js";

describe("IntervalTickSource", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it("stays idle until the first listener subscribes", () => {
    const source = new IntervalTickSource({ intervalMs: 50, now: () => Date.now() });

    expect(source.running).toBe(false);

    const subscription = source.subscribe(vi.fn());
    expect(source.running).toBe(true);

    subscription.cancel();
    expect(source.running).toBe(false);
  });

  it("reports the measured elapsed seconds on every interval", () => {
    const source = new IntervalTickSource({ intervalMs: 50, now: () => Date.now() });
    const deltas: number[] = [];

    source.subscribe((delta) => {
      deltas.push(delta);
    });
    vi.advanceTimersByTime(150);

    expect(deltas).toEqual([0.05, 0.05, 0.05]);
  });

  it("keeps ticking other listeners when one throws", () => {
    const logger = createSilentLogger();
    const source = new IntervalTickSource({ intervalMs: 10, now: () => Date.now(), logger });
    const healthy = vi.fn();

    source.subscribe(() => {
      throw new Error("listener down");
    });
    source.subscribe(healthy);
    vi.advanceTimersByTime(10);

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Tick listener failed", {
      error: expect.any(Error),
    });
  });

  it("drops every listener on stop", () => {
    const logger = createSilentLogger();
    const source = new IntervalTickSource({ intervalMs: 10, now: () => Date.now(), logger });
    const listener = vi.fn();

    source.subscribe(listener);
    source.stop();
    vi.advanceTimersByTime(100);

    expect(listener).not.toHaveBeenCalled();
    expect(source.running).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Stopping tick source with active listeners", {
      listeners: 1,
    });
  });

  it("rejects non-positive intervals", () => {
    expect(() => new IntervalTickSource({ intervalMs: 0 })).toThrow(
      "Tick interval must be a positive number of milliseconds",
    );
  });

  it("drives a scheduler in real time", () => {
    const source = new IntervalTickSource({ intervalMs: 50, now: () => Date.now() });
    const scheduler = new TimerScheduler({ tickSource: source });
    const callback = vi.fn();

    const handle = scheduler.startTimer(0.1, callback);

    vi.advanceTimersByTime(50);
    expect(callback).not.toHaveBeenCalled();
    expect(handle.completedPercentage).toBeCloseTo(0.5);

    vi.advanceTimersByTime(100);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(scheduler.activeCount).toBe(0);
    expect(source.running).toBe(false);
  });
});
