import type { Seconds, TimerCallback, TimerId } from "../typedefs.js";

export interface TimerSnapshot {
  readonly id: TimerId;
  readonly label: string | undefined;
  readonly duration: Seconds;
  readonly elapsedTime: Seconds;
  readonly remainingTime: Seconds;
  readonly completedPercentage: number;
  readonly isCompleted: boolean;
  readonly isActive: boolean;
}

/**
 * Read-only view of a timer handed out by the scheduler.
 *
 * Progress is only ever mutated by the scheduler that created the timer; callers cancel through
 * {@link TimerScheduler.stopTimer}.
 */
export interface TimerView extends TimerSnapshot {
  toSnapshot(): TimerSnapshot;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class TimerHandle implements TimerView {
  readonly #id: TimerId;
  readonly #label: string | undefined;
  readonly #duration: Seconds;
  #callback: TimerCallback | undefined;
  #elapsed: Seconds = 0;
  #remaining: Seconds = 0;
  #completedPercentage = 0;
  #isCompleted = false;
  #isActive = true;

  constructor(id: TimerId, duration: Seconds, callback?: TimerCallback, label?: string) {
    this.#id = id;
    this.#label = label;
    this.#duration = Number.isNaN(duration) ? 0 : Math.abs(duration);
    this.#callback = callback;
  }

  get id(): TimerId {
    return this.#id;
  }

  get label(): string | undefined {
    return this.#label;
  }

  get duration(): Seconds {
    return this.#duration;
  }

  get elapsedTime(): Seconds {
    return this.#elapsed;
  }

  get remainingTime(): Seconds {
    return this.#remaining;
  }

  get completedPercentage(): number {
    return this.#completedPercentage;
  }

  get isCompleted(): boolean {
    return this.#isCompleted;
  }

  get isActive(): boolean {
    return this.#isActive;
  }

  /**
   * Moves the timer forward by one tick.
   *
   * Completion is checked after the whole delta is applied, so a timer may fire late by up to
   * one tick but never early. The callback runs synchronously; if it throws, the handle is
   * still cancelled before the error propagates.
   *
   * @returns true once the timer is finished (completed or cancelled) and must not be advanced again
   */
  advance(deltaTime: Seconds): boolean {
    if (!this.#isActive || this.#isCompleted) {
      this.cancel();
      return true;
    }

    const delta = Number.isNaN(deltaTime) || deltaTime < 0 ? 0 : deltaTime;
    this.#elapsed += delta;
    this.#remaining = clamp(this.#duration - this.#elapsed, 0, this.#duration);

    if (this.#elapsed >= this.#duration) {
      this.#isCompleted = true;
      this.#remaining = 0;
      this.#completedPercentage = 1;
      const callback = this.#callback;
      try {
        callback?.();
      } finally {
        this.cancel();
      }
      return true;
    }

    this.#completedPercentage = this.#elapsed / this.#duration;
    return false;
  }

  cancel(): void {
    this.#isActive = false;
    this.#callback = undefined;
  }

  toSnapshot(): TimerSnapshot {
    return {
      id: this.#id,
      label: this.#label,
      duration: this.#duration,
      elapsedTime: this.#elapsed,
      remainingTime: this.#remaining,
      completedPercentage: this.#completedPercentage,
      isCompleted: this.#isCompleted,
      isActive: this.#isActive,
    };
  }
}
