import { Command, type CommandContext } from "./Command.js";
import { afterRosterShrink, detachConnection } from "./Membership.js";
import { commitRoom, registryOf, withRoomIfPresent } from "./RoomTransaction.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/** A deliberate leave evicts at once; there is nothing to wait for. */
export class LeaveRoom extends Command {
  readonly type = "LeaveRoom" as const;

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
      const registry = registryOf(state, ctx);
      registry.require(this.playerId, this.connectionId);
      registry.evict(this.playerId, this.at);

      await ctx.scheduler.cancelTimeout({
        kind: "grace",
        roomCode: state.code,
        playerId: this.playerId,
      });
      await detachConnection(state, this.connectionId, ctx);
      await afterRosterShrink(state, this.at, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Player left", {
        type: this.type,
        code: state.code,
        playerId: this.playerId,
      });
    });
  }
}
