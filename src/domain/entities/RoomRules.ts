import { InvalidRoomStateError } from "../errors/InvalidRoomStateError.js";
import type { BallotEntry, RoomSnapshot } from "../events.js";
import type { Player, RoomState, RoomSummary } from "../ports/RoomGateway.js";
import type { PlayerId, RoomPhase } from "../typedefs.js";

const VALID_PHASES: readonly RoomPhase[] = [
  "lobby",
  "challenge",
  "voting",
  "results",
  "closed",
];

export function connectedPlayers(state: RoomState): Player[] {
  return state.players.filter((player) => player.connected && !player.evicted);
}

export function hasResponse(state: RoomState, playerId: PlayerId): boolean {
  const response = state.responses[playerId];
  return response !== undefined && response.text.length > 0;
}

/** Connected players who have at least one response other than their own to vote for. */
export function eligibleVoters(state: RoomState): Player[] {
  const authors = Object.keys(state.responses).filter((id) => hasResponse(state, id));
  return connectedPlayers(state).filter((player) =>
    authors.some((author) => author !== player.id),
  );
}

export function allConnectedResponded(state: RoomState): boolean {
  const connected = connectedPlayers(state);
  return connected.length > 0 && connected.every((player) => hasResponse(state, player.id));
}

export function allEligibleVoted(state: RoomState): boolean {
  return eligibleVoters(state).every((player) => state.votes[player.id] !== undefined);
}

export function nextResponseOrder(state: RoomState): number {
  return Object.keys(state.responses).length;
}

/** Non-empty responses in submission order. */
export function buildBallot(state: RoomState): BallotEntry[] {
  return Object.entries(state.responses)
    .filter(([, response]) => response.text.length > 0)
    .sort(([, a], [, b]) => a.order - b.order)
    .map(([playerId, response]) => ({
      playerId,
      displayName: displayNameOf(state, playerId),
      text: response.text,
    }));
}

export function displayNameOf(state: RoomState, playerId: PlayerId): string {
  return state.players.find((player) => player.id === playerId)?.displayName ?? playerId;
}

export function toSnapshot(state: RoomState): RoomSnapshot {
  const showBallot = state.phase === "voting" || state.phase === "results";

  return {
    type: "RoomSnapshot",
    code: state.code,
    name: state.name,
    revision: state.revision,
    phase: state.phase,
    roundNumber: state.roundNumber,
    players: state.players
      .filter((player) => !player.evicted)
      .map((player) => ({
        id: player.id,
        displayName: player.displayName,
        connected: player.connected,
        score: player.score,
        responded: hasResponse(state, player.id),
        voted: state.votes[player.id] !== undefined,
      })),
    ...(state.challenge
      ? {
          challenge: {
            text: state.challenge.text,
            category: state.challenge.category,
            roundNumber: state.challenge.roundNumber,
          },
        }
      : {}),
    ...(state.phaseDeadline !== undefined ? { deadline: state.phaseDeadline } : {}),
    responsesSubmittedCount: Object.keys(state.responses).filter((id) =>
      hasResponse(state, id),
    ).length,
    votesCastCount: Object.keys(state.votes).length,
    ...(showBallot ? { ballot: buildBallot(state) } : {}),
    ...(state.phase === "results" && state.results ? { results: [...state.results] } : {}),
  };
}

export function toSummary(state: RoomState): RoomSummary {
  return {
    code: state.code,
    name: state.name,
    phase: state.phase,
    playerCount: state.players.filter((player) => !player.evicted).length,
    connectedCount: connectedPlayers(state).length,
    createdAt: state.createdAt,
  };
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the room invariants
// -----------------------------------------------------------------------------
export function assertValidRoomState(state: RoomState): void {
  const fail = (reason: string): never => {
    throw new InvalidRoomStateError(reason, state);
  };

  // --- 1. Generic invariants -------------------------------------------------
  if (!VALID_PHASES.includes(state.phase)) fail(`invalid phase: ${String(state.phase)}`);

  if (!Number.isInteger(state.roundNumber) || state.roundNumber < 0)
    fail("round number must be a non-negative integer");

  const playerIds = new Set(state.players.map((player) => player.id));
  if (playerIds.size !== state.players.length) fail("duplicate player IDs");

  for (const player of state.players) {
    if (player.displayName.length === 0) fail(`empty display name for ${player.id}`);
    if (!Number.isInteger(player.score) || player.score < 0)
      fail(`invalid score for ${player.id}`);
    if (player.evicted && player.connected) fail(`evicted player ${player.id} is connected`);
  }

  for (const pid of Object.keys(state.responses)) {
    if (!playerIds.has(pid)) fail(`response from unknown player ${pid}`);
  }

  for (const [voter, target] of Object.entries(state.votes)) {
    if (!playerIds.has(voter)) fail(`vote from unknown player ${voter}`);
    if (voter === target) fail(`self vote recorded for ${voter}`);
    if (!hasResponse(state, target)) fail(`vote from ${voter} targets a missing response`);
  }

  // --- 2. Phase-specific invariants -----------------------------------------
  switch (state.phase) {
    case "lobby":
      if (state.roundNumber !== 0) fail("lobby must not carry a round number");
      if (state.challenge) fail("lobby must not carry a challenge");
      if (Object.keys(state.responses).length > 0) fail("lobby must not carry responses");
      break;

    case "challenge":
    case "voting":
      if (!state.challenge) fail("missing challenge");
      if (state.phaseDeadline === undefined) fail("missing phase deadline");
      if (state.phase === "challenge" && Object.keys(state.votes).length > 0)
        fail("votes recorded before voting");
      break;

    case "results":
      if (!state.challenge) fail("missing challenge");
      if (!state.results) fail("missing results");
      break;

    case "closed":
      break;
  }

  if (state.challenge && state.challenge.roundNumber !== state.roundNumber)
    fail("challenge belongs to another round");
}
