/* eslint-disable functional/immutable-data */
import { connectedPlayers } from "../entities/RoomRules.js";
import { roomChannel } from "../ports/MessageBus.js";
import type { Player, RoomState } from "../ports/RoomGateway.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { advanceIfComplete } from "./PhaseTransitions.js";

/** Handed back to the session that joined so it can address the room later. */
export interface RoomMembership {
  readonly roomCode: RoomCode;
  readonly playerId: PlayerId;
  readonly resumeToken: string;
}

/**
 * Attach `connectionId` to the room channel and tell it who it is. The
 * subscription happens before the caller commits, so the joiner receives the
 * same snapshot as everyone else.
 */
export async function attachConnection(
  state: RoomState,
  player: Player,
  connectionId: ConnectionId,
  ctx: Pick<CommandContext, "bus" | "scheduler">,
): Promise<RoomMembership> {
  await ctx.scheduler.cancelTimeout({ kind: "grace", roomCode: state.code, playerId: player.id });
  await ctx.scheduler.cancelTimeout({ kind: "closure", roomCode: state.code });
  await ctx.bus.subscribe(roomChannel(state.code), connectionId);
  await ctx.bus.send(connectionId, {
    type: "Joined",
    code: state.code,
    playerId: player.id,
    displayName: player.displayName,
    resumeToken: player.resumeToken,
  });

  return {
    roomCode: state.code,
    playerId: player.id,
    resumeToken: player.resumeToken,
  };
}

export async function detachConnection(
  state: RoomState,
  connectionId: ConnectionId,
  ctx: Pick<CommandContext, "bus">,
): Promise<void> {
  await ctx.bus.unsubscribe(roomChannel(state.code), connectionId);
  await ctx.bus.send(connectionId, { type: "LeftRoom", code: state.code });
}

/**
 * Roster bookkeeping after a player stopped participating: the remaining
 * players may now all have acted, and an empty room starts its closure
 * countdown.
 */
export async function afterRosterShrink(
  state: RoomState,
  at: TimePoint,
  ctx: Pick<CommandContext, "scheduler" | "config" | "logger">,
): Promise<void> {
  await advanceIfComplete(state, at, ctx);

  if (connectedPlayers(state).length === 0) {
    await ctx.scheduler.scheduleTimeout(
      { kind: "closure", roomCode: state.code },
      ctx.config.graceWindowMs,
    );
    ctx.logger?.info("Room empty; closure scheduled", {
      code: state.code,
      closesAt: at + ctx.config.graceWindowMs,
    });
  }
}
