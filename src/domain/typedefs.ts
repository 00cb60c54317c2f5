// Units and identifiers shared by handles, the scheduler and tick sources.

/** Unique identifier of a timer within one scheduler */
export type TimerId = string;

/** Duration or elapsed time, in seconds */
export type Seconds = number;

/** Invoked once when a timer runs to completion */
export type TimerCallback = () => void;
