import { Command, type CommandContext } from "./Command.js";
import { advanceIfComplete } from "./PhaseTransitions.js";
import { commitRoom, registryOf, withRoomIfPresent } from "./RoomTransaction.js";
import type { PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/**
 * Fired when a disconnected player's grace window lapses. The player was
 * already disconnected, so the room's closure countdown is left as it is.
 */
export class EvictPlayer extends Command {
  readonly type = "EvictPlayer" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoomIfPresent(ctx, this.roomCode, async (state) => {
      const registry = registryOf(state, ctx);
      const player = registry.find(this.playerId);

      if (!player || player.evicted || player.connected) {
        return;
      }

      registry.evict(this.playerId, this.at);

      ctx.logger?.info("Player evicted after grace window", {
        type: this.type,
        code: state.code,
        playerId: this.playerId,
      });

      await advanceIfComplete(state, this.at, ctx);
      await commitRoom(state, ctx);
    });
  }
}
