import { Command, type CommandContext } from "./Command.js";
import { launchRound } from "./RoundLauncher.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

/** Play another round with the same roster; scores carry over. */
export class ContinueGame extends Command {
  readonly type = "ContinueGame" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await launchRound(this.roomCode, this.playerId, this.connectionId, "results", ctx);
  }
}
