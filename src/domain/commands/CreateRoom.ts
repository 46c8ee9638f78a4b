import { Command, type CommandContext } from "./Command.js";
import { attachConnection, type RoomMembership } from "./Membership.js";
import { commitRoom, registryOf, withRoom } from "./RoomTransaction.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";

const DEFAULT_ROOM_NAME = "New Room";
const MAX_ROOM_NAME_LENGTH = 40;

/** Open a fresh lobby and seat its creator as the first player. */
export class CreateRoom extends Command<RoomMembership> {
  readonly type = "CreateRoom" as const;
  readonly roomName: string;

  constructor(
    public readonly displayName: string,
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
    roomName?: string,
  ) {
    super();

    const issues: string[] = [];
    if (displayName.trim().length === 0) {
      issues.push("Display name must not be empty");
    }

    const name = (roomName ?? "").trim().replace(/\s+/g, " ");
    if (name.length > MAX_ROOM_NAME_LENGTH) {
      issues.push(`Room name must be at most ${MAX_ROOM_NAME_LENGTH} characters`);
    }
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }

    this.roomName = name.length > 0 ? name : DEFAULT_ROOM_NAME;
  }

  async execute(ctx: CommandContext): Promise<RoomMembership> {
    const { code } = await ctx.roomGateway.createRoom(this.at, this.roomName);

    try {
      return await withRoom(ctx, code, async (state) => {
        const player = registryOf(state, ctx).join(this.displayName, this.connectionId, this.at);
        const membership = await attachConnection(state, player, this.connectionId, ctx);
        await commitRoom(state, ctx);

        ctx.logger?.info("Room created", {
          type: this.type,
          code,
          name: state.name,
          playerId: player.id,
        });

        return membership;
      });
    } catch (error) {
      await ctx.roomGateway.removeRoom(code);
      throw error;
    }
  }
}
