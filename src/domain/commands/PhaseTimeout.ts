import { Command, type CommandContext } from "./Command.js";
import { enterResults, enterVoting } from "./PhaseTransitions.js";
import { withRoomIfPresent } from "./RoomTransaction.js";
import type { RoomCode, TimedPhase, TimePoint } from "../typedefs.js";

/**
 * The only way out of a timed phase. A timeout that names a phase or round
 * the room has already left is stale and does nothing, which is what makes a
 * transition happen once however many timers race for it.
 */
export class PhaseTimeout extends Command {
  readonly type = "PhaseTimeout" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly phase: TimedPhase,
    public readonly roundNumber: number,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await withRoomIfPresent(ctx, this.roomCode, async (state) => {
      if (state.phase !== this.phase || state.roundNumber !== this.roundNumber) {
        ctx.logger?.debug("Stale phase timeout ignored", {
          type: this.type,
          code: state.code,
          phase: this.phase,
          roundNumber: this.roundNumber,
          current: state.phase,
        });
        return;
      }

      if (state.phase === "challenge") {
        await enterVoting(state, this.at, ctx);
      } else {
        await enterResults(state, this.at, ctx);
      }
    });
  }
}
