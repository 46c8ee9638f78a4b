import { Command, type CommandContext } from "./Command.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/** Names are frozen while a round is running. */
export class RenamePlayer extends Command {
  readonly type = "RenamePlayer" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly displayName: string,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoom(ctx, this.roomCode, async (state) => {
      if (state.phase !== "lobby" && state.phase !== "results") {
        throw ActionRejectedError.because(
          "InvalidPhaseForAction",
          `Cannot rename during the ${state.phase} phase`,
        );
      }

      const registry = registryOf(state, ctx);
      registry.require(this.playerId, this.connectionId);
      const player = registry.rename(this.playerId, this.displayName);
      await commitRoom(state, ctx);

      ctx.logger?.info("Player renamed", {
        type: this.type,
        code: state.code,
        playerId: player.id,
        displayName: player.displayName,
      });
    });
  }
}
