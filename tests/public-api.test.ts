import { describe, expect, it, vi } from "vitest";

import {
  InvalidArgumentError,
  ManualTickSource,
  TimerScheduler,
  createSchedulerConfig,
  mulberry32,
  type TimerService,
} from "../src/index.js";

describe("package entry point", () => {
  it("runs a countdown end to end through the exported API", () => {
    const tickSource = new ManualTickSource();
    const service: TimerService = new TimerScheduler({
      tickSource,
      random: mulberry32(1),
      config: createSchedulerConfig({ idPrefix: "round" }),
    });
    const onDone = vi.fn();

    const timer = service.startTimer(1, onDone, { label: "warmup" });
    tickSource.runFor(1, 0.25);

    expect(timer.id).toBe("round-1");
    expect(timer.isCompleted).toBe(true);
    expect(onDone).toHaveBeenCalledTimes(1);
    expect(service.activeCount).toBe(0);
    expect(() => service.startRandomTimer(2, 1)).toThrow(InvalidArgumentError);
  });
});
