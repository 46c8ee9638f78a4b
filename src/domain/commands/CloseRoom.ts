/* eslint-disable functional/immutable-data */
import { Command, type CommandContext } from "./Command.js";
import { commitRoom, withRoomIfPresent } from "./RoomTransaction.js";
import { connectedPlayers } from "../entities/RoomRules.js";
import { roomChannel } from "../ports/MessageBus.js";
import type { RoomCode, TimePoint } from "../typedefs.js";

/** Dispose of a room that stayed empty for the whole grace window. */
export class CloseRoom extends Command {
  readonly type = "CloseRoom" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { roomGateway, bus, scheduler, logger } = ctx;

    await withRoomIfPresent(ctx, this.roomCode, async (state) => {
      if (connectedPlayers(state).length > 0) {
        return;
      }

      await scheduler.cancelTimeout({ kind: "phase", roomCode: state.code });
      await scheduler.cancelTimeout({ kind: "closure", roomCode: state.code });
      for (const player of state.players) {
        await scheduler.cancelTimeout({
          kind: "grace",
          roomCode: state.code,
          playerId: player.id,
        });
      }

      state.phase = "closed";
      state.pendingRound = undefined;
      state.phaseStartedAt = this.at;
      state.phaseDeadline = undefined;

      await commitRoom(state, ctx);
      await bus.publish(roomChannel(state.code), {
        type: "RoomClosed",
        code: state.code,
        at: this.at,
      });
      await roomGateway.removeRoom(state.code);

      logger?.info("Room closed", { type: this.type, code: state.code, at: this.at });
    });
  }
}
