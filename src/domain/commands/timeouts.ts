import type { RoomTimeout } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";
import { CloseRoom } from "./CloseRoom.js";
import type { Command } from "./Command.js";
import { EvictPlayer } from "./EvictPlayer.js";
import { PhaseTimeout } from "./PhaseTimeout.js";

/** The command a scheduler dispatches when `timeout` fires at `at`. */
export function timeoutToCommand(timeout: RoomTimeout, at: TimePoint): Command {
  switch (timeout.kind) {
    case "phase":
      return new PhaseTimeout(timeout.roomCode, timeout.phase, timeout.roundNumber, at);
    case "grace":
      return new EvictPlayer(timeout.roomCode, timeout.playerId, at);
    case "closure":
      return new CloseRoom(timeout.roomCode, at);
  }
}
