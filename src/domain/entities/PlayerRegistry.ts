/* eslint-disable functional/immutable-data */
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { Player } from "../ports/RoomGateway.js";
import type { ConnectionId, PlayerId, TimePoint } from "../typedefs.js";

const INNER_WHITESPACE = /\s+/g;

export interface PlayerRegistryLimits {
  readonly maxPlayers: number;
  readonly maxDisplayNameLength: number;
}

/**
 * Roster operations over a room's player list. Players are never removed
 * from the list: a dropped player is marked disconnected and, once the grace
 * window lapses, evicted.
 *
 * Name policy: a name already held by another non-evicted player (compared
 * case-insensitively) gets the smallest free numeric suffix, so a second
 * "Sam" becomes "Sam 2".
 */
export class PlayerRegistry {
  constructor(
    private readonly players: Player[],
    private readonly limits: PlayerRegistryLimits,
  ) {}

  join(
    displayName: string,
    connectionId: ConnectionId,
    at: TimePoint,
    resumeToken: string = globalThis.crypto.randomUUID(),
  ): Player {
    if (this.active().length >= this.limits.maxPlayers) {
      throw ActionRejectedError.because(
        "RoomFull",
        `Room is full (${this.limits.maxPlayers} players)`,
      );
    }

    const player: Player = {
      id: `p${this.players.length + 1}`,
      displayName: this.#disambiguate(this.#normalizeName(displayName)),
      connected: true,
      score: 0,
      joinedAt: at,
      connectionId,
      resumeToken,
      evicted: false,
    };

    this.players.push(player);
    return player;
  }

  rename(playerId: PlayerId, displayName: string): Player {
    const player = this.require(playerId);
    player.displayName = this.#disambiguate(this.#normalizeName(displayName), playerId);
    return player;
  }

  markDisconnected(playerId: PlayerId, at: TimePoint): Player {
    const player = this.require(playerId);
    player.connected = false;
    player.disconnectedAt = at;
    delete player.connectionId;
    return player;
  }

  /** Restore a non-evicted player onto a new connection. */
  reconnect(playerId: PlayerId, resumeToken: string, connectionId: ConnectionId): boolean {
    const player = this.find(playerId);
    if (!player || player.evicted || player.resumeToken !== resumeToken) {
      return false;
    }

    player.connected = true;
    player.connectionId = connectionId;
    delete player.disconnectedAt;
    return true;
  }

  evict(playerId: PlayerId, at: TimePoint): Player {
    const player = this.require(playerId);
    player.connected = false;
    player.evicted = true;
    player.disconnectedAt ??= at;
    delete player.connectionId;
    return player;
  }

  allConnected(): Player[] {
    return this.players.filter((player) => player.connected && !player.evicted);
  }

  active(): Player[] {
    return this.players.filter((player) => !player.evicted);
  }

  find(playerId: PlayerId): Player | undefined {
    return this.players.find((player) => player.id === playerId);
  }

  /**
   * Look up a non-evicted player or reject the action. Given a connection,
   * the player must still be speaking through it.
   */
  require(playerId: PlayerId, connectionId?: ConnectionId): Player {
    const player = this.find(playerId);
    if (!player || player.evicted) {
      throw ActionRejectedError.because("PlayerNotInRoom", `Player ${playerId} is not in this room`);
    }
    if (connectionId !== undefined && player.connectionId !== connectionId) {
      throw ActionRejectedError.because(
        "PlayerNotInRoom",
        `Connection ${connectionId} no longer speaks for player ${playerId}`,
      );
    }
    return player;
  }

  #normalizeName(displayName: string): string {
    const name = displayName.trim().replace(INNER_WHITESPACE, " ");

    if (name.length === 0) {
      throw ActionRejectedError.because("InvalidInput", "Display name must not be empty");
    }

    if (name.length > this.limits.maxDisplayNameLength) {
      throw ActionRejectedError.because(
        "InvalidInput",
        `Display name must be at most ${this.limits.maxDisplayNameLength} characters`,
      );
    }

    return name;
  }

  #disambiguate(name: string, self?: PlayerId): string {
    const taken = new Set(
      this.active()
        .filter((player) => player.id !== self)
        .map((player) => player.displayName.toLowerCase()),
    );

    if (!taken.has(name.toLowerCase())) {
      return name;
    }

    let suffix = 2;
    while (taken.has(`${name} ${suffix}`.toLowerCase())) {
      suffix += 1;
    }
    return `${name} ${suffix}`;
  }
}
