import { Command, type CommandContext } from "./Command.js";
import { attachConnection, type RoomMembership } from "./Membership.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, RoomCode, TimePoint } from "../typedefs.js";

const ROOM_CODE_PATTERN = /^[A-Za-z0-9]{4,8}$/;

export class JoinRoom extends Command<RoomMembership> {
  readonly type = "JoinRoom" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly displayName: string,
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();

    const issues: string[] = [];
    if (!ROOM_CODE_PATTERN.test(roomCode.trim())) {
      issues.push("Room code must be 4-8 letters or digits");
    }
    if (displayName.trim().length === 0) {
      issues.push("Display name must not be empty");
    }
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }
  }

  async execute(ctx: CommandContext): Promise<RoomMembership> {
    return withRoom(ctx, this.roomCode.trim(), async (state) => {
      const player = registryOf(state, ctx).join(this.displayName, this.connectionId, this.at);
      const membership = await attachConnection(state, player, this.connectionId, ctx);
      await commitRoom(state, ctx);

      ctx.logger?.info("Player joined", {
        type: this.type,
        code: state.code,
        playerId: player.id,
        phase: state.phase,
      });

      return membership;
    });
  }
}
