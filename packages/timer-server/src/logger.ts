/* eslint-disable no-console */
import type { Logger } from "./core.js";

type Level = "debug" | "info" | "warn" | "error";

export function createConsoleLogger(
  namespace: string,
  env: NodeJS.ProcessEnv = process.env,
): Logger {
  const prefix = `[${namespace}]`;
  const write = (level: Level, message: string, meta: unknown): void => {
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${prefix}`;
    console[level](line, message, meta ?? "");
  };

  return {
    info(message: string, meta?: unknown): void {
      write("info", message, meta);
    },
    warn(message: string, meta?: unknown): void {
      write("warn", message, meta);
    },
    error(message: string, meta?: unknown): void {
      write("error", message, meta);
    },
    debug(message: string, meta?: unknown): void {
      if (env["DEBUG"]) {
        write("debug", message, meta);
      }
    },
  } satisfies Logger;
}
