/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { publishPhaseChanged } from "./PhaseTransitions.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/** Back to the lobby. Scores are kept for the room's lifetime. */
export class EndGame extends Command {
  readonly type = "EndGame" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoom(ctx, this.roomCode, async (state) => {
      registryOf(state, ctx).require(this.playerId, this.connectionId);

      if (state.phase !== "results") {
        throw ActionRejectedError.because(
          "InvalidPhaseForAction",
          `Cannot end the game during the ${state.phase} phase`,
        );
      }

      await ctx.scheduler.cancelTimeout({ kind: "phase", roomCode: state.code });

      state.phase = "lobby";
      state.roundNumber = 0;
      state.pendingRound = undefined;
      state.challenge = undefined;
      state.responses = {};
      state.votes = {};
      state.results = undefined;
      state.phaseStartedAt = this.at;
      state.phaseDeadline = undefined;

      await commitRoom(state, ctx);

      ctx.logger?.info("Game ended; back to lobby", {
        type: this.type,
        code: state.code,
      });

      await publishPhaseChanged(state, this.at, ctx);
    });
  }
}
