/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { advanceIfComplete } from "./PhaseTransitions.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { nextResponseOrder } from "../entities/RoomRules.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

export class SubmitResponse extends Command {
  readonly type = "SubmitResponse" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly text: string,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const text = this.text.trim();

    if (text.length === 0) {
      throw ActionRejectedError.because("InvalidInput", "Response must not be empty");
    }

    if (text.length > ctx.config.maxResponseLength) {
      throw ActionRejectedError.because(
        "InvalidInput",
        `Response must be at most ${ctx.config.maxResponseLength} characters`,
      );
    }

    await withRoom(ctx, this.roomCode, async (state) => {
      registryOf(state, ctx).require(this.playerId, this.connectionId);

      if (state.phase !== "challenge") {
        throw ActionRejectedError.because(
          "InvalidPhaseForAction",
          `Cannot submit a response during the ${state.phase} phase`,
        );
      }

      if (state.responses[this.playerId] !== undefined) {
        throw ActionRejectedError.because(
          "DuplicateSubmission",
          "A response was already submitted this round",
        );
      }

      state.responses[this.playerId] = {
        text,
        submittedAt: this.at,
        order: nextResponseOrder(state),
      };

      await advanceIfComplete(state, this.at, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Response submitted", {
        type: this.type,
        code: state.code,
        playerId: this.playerId,
        roundNumber: state.roundNumber,
      });
    });
  }
}
