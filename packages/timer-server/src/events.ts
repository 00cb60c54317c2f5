import type { TimerSnapshot } from "./core.js";

export const TIMERS_CHANNEL = "timers";

export type TimerEvent =
  | { readonly type: "TimerStarted"; readonly timer: TimerSnapshot; readonly at: number }
  | { readonly type: "TimerStopped"; readonly timer: TimerSnapshot; readonly at: number }
  | { readonly type: "TimerFinished"; readonly timer: TimerSnapshot; readonly at: number }
  | { readonly type: "TimersCleared"; readonly count: number; readonly at: number };

export interface MessageBus {
  publish(channel: string, event: TimerEvent): Promise<void>;
}
