/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { TimerHandle, type TimerView } from "./entities/TimerHandle.js";
import { InvalidArgumentError, UnsupportedOperationError } from "./errors/index.js";
import type { Logger } from "./ports/Logger.js";
import type { TickSource, TickSubscription } from "./ports/TickSource.js";
import type { FinishedListener, TimerOptions, TimerService } from "./ports/TimerService.js";
import { uniform, type RandomSource } from "./random.js";
import { createSchedulerConfig, type SchedulerConfig } from "./SchedulerConfig.js";
import type { Seconds, TimerCallback, TimerId } from "./typedefs.js";

export interface TimerSchedulerOptions {
  readonly tickSource: TickSource;
  readonly random?: RandomSource;
  readonly logger?: Logger;
  readonly config?: SchedulerConfig;
}

/**
 * Owns every live timer and the task that drives it.
 *
 * Each timer gets its own subscription on the tick source; that subscription is the only caller
 * of {@link TimerHandle.advance}. A handle stays in the registry until the tick after it stops
 * being active, or until it is stopped through this scheduler.
 */
export class TimerScheduler implements TimerService {
  #timers: Map<TimerHandle, TickSubscription> = new Map();
  #listeners: Set<FinishedListener> = new Set();
  #nextId = 1;
  #disposed = false;
  readonly #tickSource: TickSource;
  readonly #random: RandomSource;
  readonly #logger: Logger | undefined;
  readonly #config: SchedulerConfig;

  constructor(options: TimerSchedulerOptions) {
    this.#tickSource = options.tickSource;
    this.#random = options.random ?? Math.random;
    this.#logger = options.logger;
    this.#config = options.config ?? createSchedulerConfig();
  }

  get activeCount(): number {
    return this.#timers.size;
  }

  startTimer(seconds: Seconds, callback?: TimerCallback, options: TimerOptions = {}): TimerView {
    if (this.#disposed) {
      throw new UnsupportedOperationError("startTimer", "scheduler has been disposed");
    }

    const id: TimerId = `${this.#config.idPrefix}-${this.#nextId}`;
    this.#nextId += 1;

    const handle = new TimerHandle(id, Math.abs(seconds), callback, options.label);
    const subscription = this.#tickSource.subscribe((deltaSeconds) => {
      this.#drive(handle, Math.min(deltaSeconds, this.#config.maxDeltaSeconds));
    });
    this.#timers.set(handle, subscription);

    this.#logger?.debug?.("Timer started", {
      id,
      label: handle.label,
      duration: handle.duration,
    });
    return handle;
  }

  startRandomTimer(
    minSeconds: Seconds,
    maxSeconds: Seconds,
    callback?: TimerCallback,
    options: TimerOptions = {},
  ): TimerView {
    const issues: string[] = [];
    if (!Number.isFinite(minSeconds) || !Number.isFinite(maxSeconds)) {
      issues.push("minSeconds and maxSeconds of the random timer must be finite numbers");
    } else {
      if (minSeconds >= maxSeconds) {
        issues.push(
          "minSeconds of the random timer can't be greater than or equal to maxSeconds",
        );
      }
      if (minSeconds <= 0 || maxSeconds <= 0) {
        issues.push("minSeconds and maxSeconds of the random timer have to be greater than 0");
      }
    }
    if (issues.length > 0) {
      throw InvalidArgumentError.because(issues);
    }

    return this.startTimer(uniform(this.#random, minSeconds, maxSeconds), callback, options);
  }

  /**
   * Returns false for views this scheduler does not track, and for a timer that has already
   * completed (including one stopped from inside its own callback).
   */
  stopTimer(handle: TimerView): boolean {
    if (!(handle instanceof TimerHandle) || handle.isCompleted) {
      return false;
    }

    const subscription = this.#timers.get(handle);
    if (!subscription) {
      return false;
    }

    handle.cancel();
    subscription.cancel();
    this.#timers.delete(handle);
    this.#logger?.debug?.("Timer stopped", { id: handle.id });
    return true;
  }

  stopTimerById(id: TimerId): boolean {
    const handle = this.#find(id);
    return handle ? this.stopTimer(handle) : false;
  }

  stopAllTimers(): void {
    const count = this.#timers.size;
    for (const [handle, subscription] of this.#timers) {
      subscription.cancel();
      handle.cancel();
    }
    this.#timers.clear();

    if (count > 0) {
      this.#logger?.info?.("All timers stopped", { count });
    }
  }

  getTimer(id: TimerId): TimerView | undefined {
    return this.#find(id);
  }

  listTimers(): TimerView[] {
    return [...this.#timers.keys()];
  }

  onFinished(listener: FinishedListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  /**
   * Detaches the scheduler from its tick source: stops every timer and drops all listeners.
   * Starting a timer afterwards throws {@link UnsupportedOperationError}.
   */
  dispose(): void {
    if (this.#disposed) {
      return;
    }

    this.stopAllTimers();
    this.#listeners.clear();
    this.#disposed = true;
    this.#logger?.info?.("Timer scheduler disposed");
  }

  /**
   * @deprecated The scheduler does not allow its driving tasks to be cancelled generically,
   * which would leave the registry out of sync. Use {@link stopAllTimers}.
   */
  stopAllTasks(): never {
    throw new UnsupportedOperationError(
      "stopAllTasks",
      "timer driving tasks can only be cancelled through stopAllTimers",
    );
  }

  #find(id: TimerId): TimerHandle | undefined {
    for (const handle of this.#timers.keys()) {
      if (handle.id === id) {
        return handle;
      }
    }
    return undefined;
  }

  #drive(handle: TimerHandle, deltaSeconds: Seconds): void {
    let finished: boolean;
    try {
      finished = handle.advance(deltaSeconds);
    } catch (error) {
      this.#logger?.error?.("Timer callback failed", { id: handle.id, error });
      finished = true;
    }

    if (!finished) {
      return;
    }

    this.#timers.get(handle)?.cancel();
    this.#timers.delete(handle);

    if (handle.isCompleted) {
      this.#logger?.debug?.("Timer finished", { id: handle.id });
      this.#notifyFinished(handle);
    }
  }

  #notifyFinished(handle: TimerHandle): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(handle);
      } catch (error) {
        this.#logger?.warn?.("Timer finished listener failed", { id: handle.id, error });
      }
    }
  }
}
