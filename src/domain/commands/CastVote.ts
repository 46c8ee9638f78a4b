/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { advanceIfComplete } from "./PhaseTransitions.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { hasResponse } from "../entities/RoomRules.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

export class CastVote extends Command {
  readonly type = "CastVote" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly voterId: PlayerId,
    public readonly targetPlayerId: PlayerId,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();

    if (voterId === targetPlayerId) {
      throw ActionRejectedError.because("InvalidVoteTarget", "Players cannot vote for themselves");
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoom(ctx, this.roomCode, async (state) => {
      registryOf(state, ctx).require(this.voterId, this.connectionId);

      if (state.phase !== "voting") {
        throw ActionRejectedError.because(
          "InvalidPhaseForAction",
          `Cannot vote during the ${state.phase} phase`,
        );
      }

      if (state.votes[this.voterId] !== undefined) {
        throw ActionRejectedError.because("DuplicateSubmission", "A vote was already cast this round");
      }

      if (!hasResponse(state, this.targetPlayerId)) {
        throw ActionRejectedError.because(
          "InvalidVoteTarget",
          `Player ${this.targetPlayerId} has no response to vote for`,
        );
      }

      state.votes[this.voterId] = this.targetPlayerId;

      await advanceIfComplete(state, this.at, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Vote cast", {
        type: this.type,
        code: state.code,
        voterId: this.voterId,
        roundNumber: state.roundNumber,
      });
    });
  }
}
