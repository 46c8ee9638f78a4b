import type { ConnectionId } from "../typedefs.js";

/**
 * Fan-out of domain events. Channels group connections (one channel per
 * room); {@link send} addresses a single connection.
 */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
  send(connectionId: ConnectionId, event: object): Promise<void>;
  subscribe(channel: string, connectionId: ConnectionId): Promise<void>;
  unsubscribe(channel: string, connectionId: ConnectionId): Promise<void>;
}

export function roomChannel(code: string): string {
  return `room:${code}`;
}
