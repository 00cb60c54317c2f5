import type { TimerView } from "../entities/TimerHandle.js";
import type { Seconds, TimerCallback, TimerId } from "../typedefs.js";

export interface TimerOptions {
  readonly label?: string;
}

export type FinishedListener = (timer: TimerView) => void;

/**
 * Public surface of a timer scheduler.
 *
 * Consumers should depend on this interface rather than on the concrete scheduler: it carries
 * no way to cancel the scheduler's driving tasks other than {@link stopAllTimers}.
 */
export interface TimerService {
  startTimer(seconds: Seconds, callback?: TimerCallback, options?: TimerOptions): TimerView;
  startRandomTimer(
    minSeconds: Seconds,
    maxSeconds: Seconds,
    callback?: TimerCallback,
    options?: TimerOptions,
  ): TimerView;
  stopTimer(handle: TimerView): boolean;
  stopTimerById(id: TimerId): boolean;
  stopAllTimers(): void;
  getTimer(id: TimerId): TimerView | undefined;
  listTimers(): TimerView[];
  readonly activeCount: number;
  onFinished(listener: FinishedListener): () => void;
}
