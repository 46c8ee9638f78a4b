/* eslint-disable functional/immutable-data */
import { connectedPlayers } from "../entities/RoomRules.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ConnectionId, PlayerId, RoomCode } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { enterChallenge, resolveChallenge } from "./PhaseTransitions.js";
import { commitRoom, registryOf, withRoom, withRoomIfPresent } from "./RoomTransaction.js";

/**
 * Start the next round from `from` ("lobby" for StartGame, "results" for
 * ContinueGame). The room is marked as preparing a round, the challenge is
 * fetched with the lock released, and the result is applied only if nothing
 * moved the room on in the meantime. The phase clock starts once the
 * challenge is applied, so the fetch never eats into the players' time.
 */
export async function launchRound(
  roomCode: RoomCode,
  playerId: PlayerId,
  connectionId: ConnectionId | undefined,
  from: "lobby" | "results",
  ctx: CommandContext,
): Promise<void> {
  const roundNumber = await withRoom(ctx, roomCode, async (state) => {
    registryOf(state, ctx).require(playerId, connectionId);

    if (state.phase !== from) {
      throw ActionRejectedError.because(
        "InvalidPhaseForAction",
        `Cannot start a round from the ${state.phase} phase`,
      );
    }

    if (state.pendingRound !== undefined) {
      throw ActionRejectedError.because(
        "InvalidPhaseForAction",
        "A round is already being prepared",
      );
    }

    assertEnoughPlayers(state.code, connectedPlayers(state).length, ctx);

    const next = state.roundNumber + 1;
    state.pendingRound = next;
    await commitRoom(state, ctx);
    return next;
  });

  const draft = await resolveChallenge(roundNumber, ctx);

  await withRoomIfPresent(ctx, roomCode, async (state) => {
    if (state.phase !== from || state.pendingRound !== roundNumber) {
      ctx.logger?.info("Prepared challenge discarded; room moved on", {
        code: state.code,
        roundNumber,
        phase: state.phase,
      });
      return;
    }

    const connected = connectedPlayers(state).length;
    if (connected < ctx.config.minPlayers) {
      state.pendingRound = undefined;
      await commitRoom(state, ctx);
      assertEnoughPlayers(state.code, connected, ctx);
    }

    await enterChallenge(state, roundNumber, draft, ctx.now(), ctx);
  });
}

function assertEnoughPlayers(
  code: RoomCode,
  connected: number,
  ctx: Pick<CommandContext, "config">,
): void {
  if (connected < ctx.config.minPlayers) {
    throw ActionRejectedError.because(
      "NotEnoughPlayers",
      `Room ${code} needs at least ${ctx.config.minPlayers} connected players`,
    );
  }
}
