import type { ChallengeDraft } from "./RoomGateway.js";

export interface ChallengeGenerator {
  next(roundNumber: number, signal?: AbortSignal): Promise<ChallengeDraft>;
}
