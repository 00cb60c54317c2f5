export { TimerScheduler } from "./domain/TimerScheduler.js";
export type { TimerSchedulerOptions } from "./domain/TimerScheduler.js";
export type { TimerSnapshot, TimerView } from "./domain/entities/TimerHandle.js";
export { InvalidArgumentError, UnsupportedOperationError } from "./domain/errors/index.js";
export type { Logger } from "./domain/ports/Logger.js";
export type { TickListener, TickSource, TickSubscription } from "./domain/ports/TickSource.js";
export type { FinishedListener, TimerOptions, TimerService } from "./domain/ports/TimerService.js";
export { mulberry32, uniform } from "./domain/random.js";
export type { RandomSource } from "./domain/random.js";
export { createSchedulerConfig } from "./domain/SchedulerConfig.js";
export type { SchedulerConfig, SchedulerConfigOverrides } from "./domain/SchedulerConfig.js";
export type { Seconds, TimerCallback, TimerId } from "./domain/typedefs.js";
export { ManualTickSource } from "./adapters/in-memory/ManualTickSource.js";
