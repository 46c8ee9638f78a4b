import { toSnapshot } from "../entities/RoomRules.js";
import { PlayerRegistry } from "../entities/PlayerRegistry.js";
import { roomChannel } from "../ports/MessageBus.js";
import type { RoomState } from "../ports/RoomGateway.js";
import type { RoomCode } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

/** Load a room under its lock and hand it to `task`. Throws RoomNotFound. */
export async function withRoom<T>(
  ctx: CommandContext,
  code: RoomCode,
  task: (state: RoomState) => Promise<T> | T,
): Promise<T> {
  const key = code.toUpperCase();
  return ctx.locks.runExclusive(key, async () => {
    const state = await ctx.roomGateway.loadRoomState(key);
    return task(state);
  });
}

/** Like {@link withRoom}, but a missing room skips `task` and yields undefined. */
export async function withRoomIfPresent<T>(
  ctx: CommandContext,
  code: RoomCode,
  task: (state: RoomState) => Promise<T> | T,
): Promise<T | undefined> {
  const key = code.toUpperCase();
  return ctx.locks.runExclusive(key, async () => {
    const state = await ctx.roomGateway.findRoomState(key);
    return state ? task(state) : undefined;
  });
}

/**
 * Persist a mutated room and broadcast its new snapshot to every member.
 * Must be called while holding the room's lock.
 */
export async function commitRoom(
  state: RoomState,
  ctx: Pick<CommandContext, "roomGateway" | "bus">,
): Promise<void> {
  state.revision += 1;
  await ctx.roomGateway.saveRoomState(state);
  await ctx.bus.publish(roomChannel(state.code), toSnapshot(state));
}

export function registryOf(state: RoomState, ctx: Pick<CommandContext, "config">): PlayerRegistry {
  return new PlayerRegistry(state.players, ctx.config);
}
