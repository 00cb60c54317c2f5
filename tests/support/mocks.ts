import { vi, type Mock } from "vitest";

import type { TimerSnapshot, TimerView } from "../../src/domain/entities/TimerHandle.js";
import type { Logger } from "../../src/domain/ports/Logger.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn<T extends (...args: any[]) => unknown> = Mock<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
function createMock<T extends (...args: any[]) => unknown>(): Fn<T> {
  return vi.fn<T>();
}

export interface LoggerMock extends Logger {
  readonly debug: Fn<Logger["debug"]>;
  readonly info: Fn<Logger["info"]>;
  readonly warn: Fn<Logger["warn"]>;
  readonly error: Fn<Logger["error"]>;
}

export function createLoggerMock(): LoggerMock {
  return {
    debug: createMock<Logger["debug"]>(),
    info: createMock<Logger["info"]>(),
    warn: createMock<Logger["warn"]>(),
    error: createMock<Logger["error"]>(),
  };
}

/** Structurally valid view that no scheduler created */
export function createForeignView(overrides: Partial<TimerSnapshot> = {}): TimerView {
  const snapshot: TimerSnapshot = {
    id: "timer-1",
    label: undefined,
    duration: 1,
    elapsedTime: 0,
    remainingTime: 0,
    completedPercentage: 0,
    isCompleted: false,
    isActive: true,
    ...overrides,
  };
  return { ...snapshot, toSnapshot: () => snapshot };
}
