import { Hono } from "hono";
import type { Context, Next } from "hono";

import { InvalidArgumentError, type Logger, type TimerService, type TimerView } from "./core.js";
import { TIMERS_CHANNEL, type MessageBus, type TimerEvent } from "./events.js";

export interface CreateTimerAppOptions {
  readonly scheduler: TimerService;
  readonly bus: MessageBus;
  readonly logger: Logger;
  readonly tickIntervalMs: number;
  readonly now?: () => number;
}

type TimerBody = {
  readonly seconds?: unknown;
  readonly minSeconds?: unknown;
  readonly maxSeconds?: unknown;
  readonly label?: unknown;
};

export function createTimerApp({
  scheduler,
  bus,
  logger,
  tickIntervalMs,
  now = Date.now,
}: CreateTimerAppOptions): Hono {
  const app = new Hono();

  const publish = (event: TimerEvent): void => {
    bus.publish(TIMERS_CHANNEL, event).catch((error: unknown) => {
      logger.error?.("Failed to publish timer event", { type: event.type, error });
    });
  };

  scheduler.onFinished((timer: TimerView) => {
    publish({ type: "TimerFinished", timer: timer.toSnapshot(), at: now() });
  });

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c) =>
    c.json({
      ok: true,
      timestamp: now(),
      config: { tickIntervalMs },
      activeTimers: scheduler.activeCount,
    }),
  );

  app.get("/api/timers", (c) =>
    c.json(scheduler.listTimers().map((timer) => timer.toSnapshot())),
  );

  app.get("/api/timers/:id", (c) => {
    const timer = scheduler.getTimer(c.req.param("id"));
    if (!timer) {
      return c.json({ error: "Timer not found" }, 404);
    }
    return c.json(timer.toSnapshot());
  });

  app.post("/api/timers", async (c) => {
    const body = await c.req.json<TimerBody>().catch(() => null);

    if (!body || typeof body.seconds !== "number" || !Number.isFinite(body.seconds)) {
      return c.json({ error: "seconds must be a finite number" }, 400);
    }
    const label = parseLabel(body);
    if (label === null) {
      return c.json({ error: "label must be a string" }, 400);
    }

    const timer = scheduler.startTimer(body.seconds, undefined, label ? { label } : {});
    const snapshot = timer.toSnapshot();
    publish({ type: "TimerStarted", timer: snapshot, at: now() });
    return c.json(snapshot, 201);
  });

  app.post("/api/timers/random", async (c) => {
    const body = await c.req.json<TimerBody>().catch(() => null);

    if (!body || typeof body.minSeconds !== "number" || typeof body.maxSeconds !== "number") {
      return c.json({ error: "minSeconds and maxSeconds are required" }, 400);
    }
    const label = parseLabel(body);
    if (label === null) {
      return c.json({ error: "label must be a string" }, 400);
    }

    try {
      const timer = scheduler.startRandomTimer(
        body.minSeconds,
        body.maxSeconds,
        undefined,
        label ? { label } : {},
      );
      const snapshot = timer.toSnapshot();
      publish({ type: "TimerStarted", timer: snapshot, at: now() });
      return c.json(snapshot, 201);
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        logger.warn?.("Rejected random timer", { issues: error.issues });
        return c.json({ error: error.message }, 400);
      }
      throw error;
    }
  });

  app.delete("/api/timers/:id", (c) => {
    const timer = scheduler.getTimer(c.req.param("id"));
    if (!timer || !scheduler.stopTimer(timer)) {
      return c.json({ error: "Timer not found" }, 404);
    }

    publish({ type: "TimerStopped", timer: timer.toSnapshot(), at: now() });
    return c.json({ ok: true });
  });

  app.delete("/api/timers", (c) => {
    const count = scheduler.activeCount;
    scheduler.stopAllTimers();

    publish({ type: "TimersCleared", count, at: now() });
    return c.json({ ok: true, stopped: count });
  });

  app.onError((error, c) => {
    logger.error?.("Unhandled request error", { path: c.req.path, error });
    return c.json({ error: getErrorMessage(error) }, 500);
  });

  return app;
}

/** Returns undefined when absent and null when malformed */
function parseLabel(body: TimerBody): string | undefined | null {
  if (body.label === undefined) {
    return undefined;
  }
  if (typeof body.label !== "string") {
    return null;
  }
  const trimmed = body.label.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
