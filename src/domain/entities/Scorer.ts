import type { SubmittedResponse } from "../ports/RoomGateway.js";
import type { PlayerId } from "../typedefs.js";

export interface ScoredResponse {
  readonly rank: number;
  readonly playerId: PlayerId;
  readonly responseText: string;
  readonly voteCount: number;
  /** One point per vote received */
  readonly scoreDelta: number;
}

/**
 * Rank every response of a round by votes received, most first. Equal vote
 * counts keep submission order, so the earlier response ranks higher. Ranks
 * are 1-based and strictly sequential.
 */
export function scoreRound(
  responses: Readonly<Record<PlayerId, SubmittedResponse>>,
  votes: Readonly<Record<PlayerId, PlayerId>>,
): ScoredResponse[] {
  const voteCounts = new Map<PlayerId, number>();
  for (const target of Object.values(votes)) {
    voteCounts.set(target, (voteCounts.get(target) ?? 0) + 1);
  }

  return Object.entries(responses)
    .map(([playerId, response]) => ({
      playerId,
      response,
      voteCount: voteCounts.get(playerId) ?? 0,
    }))
    .sort(
      (a, b) => b.voteCount - a.voteCount || a.response.order - b.response.order,
    )
    .map(({ playerId, response, voteCount }, index) => ({
      rank: index + 1,
      playerId,
      responseText: response.text,
      voteCount,
      scoreDelta: voteCount,
    }));
}
