import { InvalidArgumentError } from "./errors/index.js";
import type { Seconds } from "./typedefs.js";

export interface SchedulerConfig {
  /** Upper bound applied to every tick delta before it reaches a timer */
  readonly maxDeltaSeconds: Seconds;
  readonly idPrefix: string;
}

export type SchedulerConfigOverrides = Partial<SchedulerConfig>;

export function createSchedulerConfig(
  overrides: SchedulerConfigOverrides = {},
): SchedulerConfig {
  const config: SchedulerConfig = {
    maxDeltaSeconds: overrides.maxDeltaSeconds ?? Number.POSITIVE_INFINITY,
    idPrefix: overrides.idPrefix ?? "timer",
  };

  const issues: string[] = [];
  if (Number.isNaN(config.maxDeltaSeconds) || config.maxDeltaSeconds <= 0) {
    issues.push("maxDeltaSeconds must be greater than 0");
  }
  if (config.idPrefix.trim().length === 0) {
    issues.push("idPrefix must be a non-empty string");
  }
  if (issues.length > 0) {
    throw InvalidArgumentError.because(issues);
  }

  return config;
}
