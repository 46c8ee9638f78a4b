import { Command, type CommandContext } from "./Command.js";
import { launchRound } from "./RoundLauncher.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

export class StartGame extends Command {
  readonly type = "StartGame" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    await launchRound(this.roomCode, this.playerId, this.connectionId, "lobby", ctx);
  }
}
