/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import type { ConnectionId, Logger, MessageBus } from "../core.js";

/** The part of a `ws` socket the bus writes to */
export type BusSocket = Pick<WebSocket, "send" | "readyState">;

/**
 * Connection registry and channel fan-out. Sockets are registered under a
 * connection id; channels hold connection ids, so a socket can move between
 * rooms without being re-attached.
 */
export class WebSocketBus implements MessageBus {
  #sockets: Map<ConnectionId, BusSocket> = new Map();
  #channels: Map<string, Set<ConnectionId>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  attach(connectionId: ConnectionId, socket: BusSocket): void {
    this.#sockets.set(connectionId, socket);
    this.#logger?.info("WebSocket client attached", {
      connectionId,
      size: this.#sockets.size,
    });
  }

  /** Forget a closed connection and every channel membership it held. */
  detach(connectionId: ConnectionId): void {
    this.#sockets.delete(connectionId);
    for (const [channel, members] of this.#channels) {
      members.delete(connectionId);
      if (members.size === 0) {
        this.#channels.delete(channel);
      }
    }
    this.#logger?.info("WebSocket client detached", {
      connectionId,
      size: this.#sockets.size,
    });
  }

  async subscribe(channel: string, connectionId: ConnectionId): Promise<void> {
    let members = this.#channels.get(channel);
    if (!members) {
      members = new Set<ConnectionId>();
      this.#channels.set(channel, members);
    }
    members.add(connectionId);
  }

  async unsubscribe(channel: string, connectionId: ConnectionId): Promise<void> {
    const members = this.#channels.get(channel);
    if (!members) return;
    members.delete(connectionId);
    if (members.size === 0) {
      this.#channels.delete(channel);
    }
  }

  members(channel: string): readonly ConnectionId[] {
    return [...(this.#channels.get(channel) ?? [])];
  }

  async publish(channel: string, event: object): Promise<void> {
    const members = this.#channels.get(channel);
    if (members) {
      const message = JSON.stringify(event);
      for (const connectionId of members) {
        this.#deliver(connectionId, message, channel);
      }
    }

    this.#logger?.debug("Event published", { channel, event });
  }

  async send(connectionId: ConnectionId, event: object): Promise<void> {
    this.#deliver(connectionId, JSON.stringify(event), `connection:${connectionId}`);
  }

  #deliver(connectionId: ConnectionId, message: string, channel: string): void {
    const socket = this.#sockets.get(connectionId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return;
    }

    try {
      socket.send(message);
    } catch (error) {
      this.#logger?.warn("Failed to deliver event", { channel, connectionId, error });
    }
  }
}
