/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger, TickListener, TickSource, TickSubscription } from "../core.js";

interface IntervalTickSourceOptions {
  readonly intervalMs: number;
  /** Monotonic clock in milliseconds */
  readonly now?: () => number;
  readonly logger?: Logger;
}

type Entry = {
  readonly listener: TickListener;
  active: boolean;
};

export class IntervalTickSource implements TickSource {
  #entries: Set<Entry> = new Set();
  #timer: ReturnType<typeof setInterval> | undefined;
  #last = 0;
  readonly #intervalMs: number;
  readonly #now: () => number;
  readonly #logger: Logger | undefined;

  constructor(options: IntervalTickSourceOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error("Tick interval must be a positive number of milliseconds");
    }

    this.#intervalMs = options.intervalMs;
    this.#now = options.now ?? (() => performance.now());
    this.#logger = options.logger;
  }

  get running(): boolean {
    return this.#timer !== undefined;
  }

  subscribe(listener: TickListener): TickSubscription {
    const entry: Entry = { listener, active: true };
    this.#entries.add(entry);
    this.#start();

    return {
      cancel: () => {
        entry.active = false;
        this.#entries.delete(entry);
        if (this.#entries.size === 0) {
          this.#halt();
        }
      },
    };
  }

  /** Halts ticking and drops every remaining listener. */
  stop(): void {
    if (this.#entries.size > 0) {
      this.#logger?.warn?.("Stopping tick source with active listeners", {
        listeners: this.#entries.size,
      });
    }
    for (const entry of this.#entries) {
      entry.active = false;
    }
    this.#entries.clear();
    this.#halt();
  }

  #start(): void {
    if (this.#timer) {
      return;
    }

    this.#last = this.#now();
    this.#timer = setInterval(() => this.#tick(), this.#intervalMs);
    if (typeof this.#timer.unref === "function") {
      this.#timer.unref();
    }
    this.#logger?.debug?.("Tick source started", { intervalMs: this.#intervalMs });
  }

  #halt(): void {
    if (!this.#timer) {
      return;
    }

    clearInterval(this.#timer);
    this.#timer = undefined;
    this.#logger?.debug?.("Tick source halted");
  }

  #tick(): void {
    const now = this.#now();
    const deltaSeconds = Math.max(0, now - this.#last) / 1000;
    this.#last = now;

    for (const entry of [...this.#entries]) {
      if (!entry.active) {
        continue;
      }
      try {
        entry.listener(deltaSeconds);
      } catch (error) {
        this.#logger?.error?.("Tick listener failed", { error });
      }
    }
  }
}
