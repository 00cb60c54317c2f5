/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { InvalidArgumentError } from "../../domain/errors/index.js";
import type {
  TickListener,
  TickSource,
  TickSubscription,
} from "../../domain/ports/TickSource.js";
import type { Seconds } from "../../domain/typedefs.js";

interface Entry {
  readonly listener: TickListener;
  active: boolean;
}

/**
 * Deterministic tick source used in tests and by hosts that own their own frame loop.
 *
 * Nothing advances until {@link tick} or {@link runFor} is called, which makes timer progression
 * fully controllable without real time or fake timers.
 */
export class ManualTickSource implements TickSource {
  #entries = new Set<Entry>();
  #now: Seconds = 0;

  get now(): Seconds {
    return this.#now;
  }

  get listenerCount(): number {
    return this.#entries.size;
  }

  subscribe(listener: TickListener): TickSubscription {
    const entry: Entry = { listener, active: true };
    this.#entries.add(entry);
    return {
      cancel: () => {
        entry.active = false;
        this.#entries.delete(entry);
      },
    };
  }

  tick(deltaSeconds: Seconds): void {
    if (!Number.isFinite(deltaSeconds) || deltaSeconds < 0) {
      throw InvalidArgumentError.because(["Tick delta must be a finite, non-negative number"]);
    }

    this.#now += deltaSeconds;
    const snapshot = [...this.#entries];
    for (const entry of snapshot) {
      if (entry.active) {
        entry.listener(deltaSeconds);
      }
    }
  }

  runFor(totalSeconds: Seconds, stepSeconds: Seconds): void {
    const issues: string[] = [];
    if (!Number.isFinite(totalSeconds) || totalSeconds < 0) {
      issues.push("Cannot run the tick source backwards in time");
    }
    if (!Number.isFinite(stepSeconds) || stepSeconds <= 0) {
      issues.push("Tick step must be greater than 0");
    }
    if (issues.length > 0) {
      throw InvalidArgumentError.because(issues);
    }

    let remaining = totalSeconds;
    while (remaining > 0) {
      const delta = Math.min(stepSeconds, remaining);
      this.tick(delta);
      remaining -= delta;
    }
  }
}
