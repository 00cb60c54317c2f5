import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { IntervalTickSource } from "./adapters/IntervalTickSource.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createTimerApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { TimerScheduler } from "./core.js";
import { TIMERS_CHANNEL } from "./events.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("timer-server");
  const config = loadServerConfig();
  const tickSource = new IntervalTickSource({ intervalMs: config.tickIntervalMs, logger });
  const scheduler = new TimerScheduler({ tickSource, logger });
  const bus = new WebSocketBus(logger);

  const app = createTimerApp({
    scheduler,
    bus,
    logger,
    tickIntervalMs: config.tickIntervalMs,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => ({
      onOpen(_event: Event, ws: WSContext<WebSocket>): void {
        const rawSocket = ws.raw;
        if (!rawSocket) {
          logger.warn("WebSocket connection missing raw handle");
          return;
        }
        bus.attach(TIMERS_CHANNEL, rawSocket);
      },
    })),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("Shutting down", { signal });
    scheduler.dispose();
    tickSource.stop();
    server.close((error?: Error) => {
      if (error) {
        logger.error("Failed to close server", { error });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("timer-server").error("Failed to start timer server", { error });
  process.exit(1);
});
