/* eslint-disable functional/immutable-data */
import { WebSocket } from "ws";

import type { Logger } from "../core.js";
import type { MessageBus, TimerEvent } from "../events.js";

/**
 * Pushes timer events to every open socket subscribed to the event's channel.
 *
 * A socket belongs to exactly one channel; it leaves when it closes, when it is detached, or when
 * a send to it fails.
 */
export class WebSocketBus implements MessageBus {
  readonly #channels = new Map<WebSocket, string>();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  subscriberCount(channel: string): number {
    let count = 0;
    for (const subscribed of this.#channels.values()) {
      if (subscribed === channel) {
        count += 1;
      }
    }
    return count;
  }

  attach(channel: string, socket: WebSocket): () => void {
    this.#channels.set(socket, channel);
    this.#logger?.info?.("Timer feed subscriber attached", {
      channel,
      subscribers: this.subscriberCount(channel),
    });

    const detach = (): void => {
      if (this.#channels.delete(socket)) {
        this.#logger?.info?.("Timer feed subscriber detached", {
          channel,
          subscribers: this.subscriberCount(channel),
        });
      }
    };

    socket.once("close", detach);
    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("Timer feed socket error", { channel, error });
      detach();
    });
    return detach;
  }

  async publish(channel: string, event: TimerEvent): Promise<void> {
    const frame = JSON.stringify(event);
    let delivered = 0;

    for (const [socket, subscribed] of [...this.#channels]) {
      if (subscribed !== channel || socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      socket.send(frame, (error?: Error) => {
        if (error) {
          this.#logger?.warn?.("Dropping subscriber after failed send", {
            channel,
            type: event.type,
            error,
          });
          this.#channels.delete(socket);
        }
      });
      delivered += 1;
    }

    this.#logger?.debug?.("Timer event published", { channel, type: event.type, delivered });
  }
}
