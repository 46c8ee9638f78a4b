import { Command, type CommandContext } from "./Command.js";
import { attachConnection, detachConnection, type RoomMembership } from "./Membership.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/**
 * Resume a player on a new connection. Identity and score are restored; a
 * connection still speaking for the player is detached.
 */
export class RejoinRoom extends Command<RoomMembership> {
  readonly type = "RejoinRoom" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly resumeToken: string,
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<RoomMembership> {
    return withRoom(ctx, this.roomCode.trim(), async (state) => {
      const registry = registryOf(state, ctx);
      const previousConnection = registry.find(this.playerId)?.connectionId;

      if (!registry.reconnect(this.playerId, this.resumeToken, this.connectionId)) {
        throw ActionRejectedError.because(
          "PlayerNotInRoom",
          `Cannot resume player ${this.playerId} in room ${state.code}`,
        );
      }

      if (previousConnection !== undefined && previousConnection !== this.connectionId) {
        await detachConnection(state, previousConnection, ctx);
      }

      const player = registry.require(this.playerId);
      const membership = await attachConnection(state, player, this.connectionId, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Player reconnected", {
        type: this.type,
        code: state.code,
        playerId: player.id,
        score: player.score,
      });

      return membership;
    });
  }
}
