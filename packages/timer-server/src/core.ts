export { ManualTickSource } from "@tickwise/core/adapters/in-memory/ManualTickSource.js";
export type {
  TimerSnapshot,
  TimerView,
} from "@tickwise/core/domain/entities/TimerHandle.js";
export {
  InvalidArgumentError,
  UnsupportedOperationError,
} from "@tickwise/core/domain/errors/index.js";
export type { Logger } from "@tickwise/core/domain/ports/Logger.js";
export type {
  TickListener,
  TickSource,
  TickSubscription,
} from "@tickwise/core/domain/ports/TickSource.js";
export type { TimerService } from "@tickwise/core/domain/ports/TimerService.js";
export { createSchedulerConfig } from "@tickwise/core/domain/SchedulerConfig.js";
export { TimerScheduler } from "@tickwise/core/domain/TimerScheduler.js";
export type { Seconds, TimerId } from "@tickwise/core/domain/typedefs.js";
