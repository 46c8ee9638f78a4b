import { Command, type CommandContext } from "./Command.js";
import type { RoomSummary } from "../ports/RoomGateway.js";
import type { TimePoint } from "../typedefs.js";

/** Rooms a newcomer can still join: in the lobby with a free seat. */
export class ListRooms extends Command<readonly RoomSummary[]> {
  readonly type = "ListRooms" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ roomGateway, config }: CommandContext): Promise<readonly RoomSummary[]> {
    const rooms = await roomGateway.listRooms();
    return rooms.filter((room) => room.phase === "lobby" && room.playerCount < config.maxPlayers);
  }
}
