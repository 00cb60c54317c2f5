import type { Seconds } from "../typedefs.js";

export type TickListener = (deltaSeconds: Seconds) => void;

export interface TickSubscription {
  /** Idempotent. Takes effect immediately, even mid-dispatch. */
  cancel(): void;
}

/**
 * Infrastructure abstraction that drives timer progress in discrete steps.
 *
 * Implementations may be backed by an interval, a render loop, or a test harness. Each step
 * reports the seconds elapsed since the previous one. Listeners subscribed while a step is
 * being dispatched receive their first delta on the following step.
 */
export interface TickSource {
  subscribe(listener: TickListener): TickSubscription;
}
