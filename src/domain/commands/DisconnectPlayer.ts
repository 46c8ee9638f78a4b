import { Command, type CommandContext } from "./Command.js";
import { afterRosterShrink } from "./Membership.js";
import { commitRoom, registryOf, withRoomIfPresent } from "./RoomTransaction.js";
import { roomChannel } from "../ports/MessageBus.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/**
 * A connection dropped. The player stays on the roster, marked disconnected,
 * until the grace window runs out. A drop of a connection that no longer
 * speaks for the player (it was replaced by a rejoin) changes nothing.
 */
export class DisconnectPlayer extends Command {
  readonly type = "DisconnectPlayer" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoomIfPresent(ctx, this.roomCode, async (state) => {
      await ctx.bus.unsubscribe(roomChannel(state.code), this.connectionId);

      const registry = registryOf(state, ctx);
      const player = registry.find(this.playerId);
      if (!player || player.evicted || player.connectionId !== this.connectionId) {
        return;
      }

      registry.markDisconnected(this.playerId, this.at);

      await ctx.scheduler.scheduleTimeout(
        { kind: "grace", roomCode: state.code, playerId: this.playerId },
        ctx.config.graceWindowMs,
      );
      await afterRosterShrink(state, this.at, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Player disconnected", {
        type: this.type,
        code: state.code,
        playerId: this.playerId,
        graceUntil: this.at + ctx.config.graceWindowMs,
      });
    });
  }
}
