/**
 * Structured logger accepted by the scheduler and the server.
 *
 * Domain code treats every method as optional at the call site, so a partial
 * implementation (or none at all) is enough for embedding and tests.
 */
export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
