/* eslint-disable functional/immutable-data */
import {
  allConnectedResponded,
  allEligibleVoted,
  displayNameOf,
  eligibleVoters,
  nextResponseOrder,
} from "../entities/RoomRules.js";
import { scoreRound } from "../entities/Scorer.js";
import { roomChannel } from "../ports/MessageBus.js";
import type { ChallengeDraft, RoomState } from "../ports/RoomGateway.js";
import type { TimePoint, TimedPhase } from "../typedefs.js";
import type { CommandContext } from "./Command.js";
import { callWithTimeout } from "./ExternalCall.js";
import { commitRoom } from "./RoomTransaction.js";

type PhaseTransitionContext = Pick<
  CommandContext,
  "roomGateway" | "bus" | "logger" | "scheduler" | "config"
>;

/**
 * Fetch the challenge for `roundNumber`. Never rejects: a failing or slow
 * generator falls back to the static pool. Must be awaited outside the room lock.
 */
export async function resolveChallenge(
  roundNumber: number,
  ctx: Pick<CommandContext, "challengeGenerator" | "fallbackChallenges" | "config" | "logger">,
): Promise<ChallengeDraft> {
  try {
    return await callWithTimeout("Challenge generation", ctx.config.generatorTimeoutMs, (signal) =>
      ctx.challengeGenerator.next(roundNumber, signal),
    );
  } catch (error) {
    ctx.logger?.warn("Challenge generation failed; using static pool", {
      roundNumber,
      error,
    });
    return ctx.fallbackChallenges.next(roundNumber);
  }
}

export async function enterChallenge(
  state: RoomState,
  roundNumber: number,
  draft: ChallengeDraft,
  at: TimePoint,
  ctx: PhaseTransitionContext,
): Promise<void> {
  const durationMs = draft.timeLimitMs ?? ctx.config.challengeDurationMs;

  state.phase = "challenge";
  state.roundNumber = roundNumber;
  state.pendingRound = undefined;
  state.challenge = { ...draft, roundNumber };
  state.responses = {};
  state.votes = {};
  state.results = undefined;
  state.phaseStartedAt = at;
  state.phaseDeadline = at + durationMs;

  await ctx.scheduler.scheduleTimeout(
    { kind: "phase", roomCode: state.code, phase: "challenge", roundNumber },
    durationMs,
  );

  await commitRoom(state, ctx);

  ctx.logger?.info("Room entering challenge phase", {
    code: state.code,
    roundNumber,
    at,
  });

  await publishPhaseChanged(state, at, ctx);
}

export async function enterVoting(
  state: RoomState,
  at: TimePoint,
  ctx: PhaseTransitionContext,
): Promise<void> {
  const responses = { ...state.responses };
  let order = nextResponseOrder(state);
  for (const player of state.players) {
    if (player.evicted || responses[player.id] !== undefined) continue;
    responses[player.id] = { text: "", submittedAt: at, order };
    order += 1;
  }

  state.phase = "voting";
  state.responses = responses;
  state.votes = {};
  state.phaseStartedAt = at;
  state.phaseDeadline = at + ctx.config.votingDurationMs;

  await ctx.scheduler.scheduleTimeout(
    {
      kind: "phase",
      roomCode: state.code,
      phase: "voting",
      roundNumber: state.roundNumber,
    },
    ctx.config.votingDurationMs,
  );

  if (eligibleVoters(state).length === 0) {
    await requestEarlyAdvance(state, at, ctx);
  }

  await commitRoom(state, ctx);

  ctx.logger?.info("Room entering voting phase", {
    code: state.code,
    roundNumber: state.roundNumber,
    at,
  });

  await publishPhaseChanged(state, at, ctx);
}

export async function enterResults(
  state: RoomState,
  at: TimePoint,
  ctx: PhaseTransitionContext,
): Promise<void> {
  await ctx.scheduler.cancelTimeout({ kind: "phase", roomCode: state.code });

  const scored = scoreRound(state.responses, state.votes);

  for (const entry of scored) {
    const player = state.players.find((candidate) => candidate.id === entry.playerId);
    if (player && !player.evicted) {
      player.score += entry.scoreDelta;
    }
  }

  state.results = scored.map((entry) => ({
    ...entry,
    displayName: displayNameOf(state, entry.playerId),
    cumulativeScore:
      state.players.find((player) => player.id === entry.playerId)?.score ?? 0,
  }));
  state.phase = "results";
  state.phaseStartedAt = at;
  state.phaseDeadline = undefined;

  await commitRoom(state, ctx);

  ctx.logger?.info("Round finished", {
    code: state.code,
    roundNumber: state.roundNumber,
    at,
  });

  await publishPhaseChanged(state, at, ctx);
}

/**
 * Bring the running phase's deadline forward once everyone eligible has
 * acted. The transition itself still goes through PhaseTimeout, so an early
 * timer and the original deadline can never both apply it. The new deadline
 * is no sooner than the debounce and the minimum phase duration allow.
 */
export async function requestEarlyAdvance(
  state: RoomState,
  at: TimePoint,
  ctx: Pick<CommandContext, "scheduler" | "config" | "logger">,
): Promise<void> {
  if (state.phase !== "challenge" && state.phase !== "voting") return;

  const delayMs = Math.max(
    ctx.config.earlyAdvanceDelayMs,
    state.phaseStartedAt + ctx.config.minPhaseDurationMs - at,
  );
  const deadline = at + delayMs;

  if (state.phaseDeadline !== undefined && deadline >= state.phaseDeadline) return;

  const phase: TimedPhase = state.phase;
  state.phaseDeadline = deadline;

  await ctx.scheduler.scheduleTimeout(
    { kind: "phase", roomCode: state.code, phase, roundNumber: state.roundNumber },
    delayMs,
  );

  ctx.logger?.debug("Early advance scheduled", { code: state.code, phase, deadline });
}

/** Re-check participation after the roster or the submissions changed. */
export async function advanceIfComplete(
  state: RoomState,
  at: TimePoint,
  ctx: Pick<CommandContext, "scheduler" | "config" | "logger">,
): Promise<void> {
  if (state.phase === "challenge" && allConnectedResponded(state)) {
    await requestEarlyAdvance(state, at, ctx);
  } else if (
    state.phase === "voting" &&
    eligibleVoters(state).length > 0 &&
    allEligibleVoted(state)
  ) {
    await requestEarlyAdvance(state, at, ctx);
  }
}

export async function publishPhaseChanged(
  state: RoomState,
  at: TimePoint,
  ctx: Pick<CommandContext, "bus">,
): Promise<void> {
  await ctx.bus.publish(roomChannel(state.code), {
    type: "PhaseChanged",
    code: state.code,
    phase: state.phase,
    roundNumber: state.roundNumber,
    ...(state.phaseDeadline !== undefined ? { deadline: state.phaseDeadline } : {}),
    at,
  });
}
