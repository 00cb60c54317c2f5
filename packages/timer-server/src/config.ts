import { InvalidArgumentError } from "./core.js";

export interface ServerConfig {
  readonly port: number;
  /** How often the interval tick source advances the scheduler */
  readonly tickIntervalMs: number;
}

const DEFAULT_PORT = 8787;
const DEFAULT_TICK_INTERVAL_MS = 50;
const POSITIVE_INTEGER = /^[1-9]\d*$/;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const issues: string[] = [];
  const read = (name: string, fallback: number): number => {
    const raw = env[name]?.trim();
    if (raw === undefined || raw === "") {
      return fallback;
    }
    if (!POSITIVE_INTEGER.test(raw)) {
      issues.push(`${name} must be a positive integer, got "${raw}"`);
      return fallback;
    }
    return Number(raw);
  };

  const config: ServerConfig = {
    port: read("PORT", DEFAULT_PORT),
    tickIntervalMs: read("TICK_INTERVAL_MS", DEFAULT_TICK_INTERVAL_MS),
  };

  if (issues.length > 0) {
    throw InvalidArgumentError.because(issues);
  }
  return config;
}
