import type { ChallengeGenerator } from "../../domain/ports/ChallengeGenerator.js";
import type { ChallengeDraft } from "../../domain/ports/RoomGateway.js";

export interface StaticChallenge {
  readonly text: string;
  readonly category: string;
  readonly timeLimitMs?: number;
}

export const DEFAULT_CHALLENGES: readonly StaticChallenge[] = [
  { text: "Write the opening line of a mystery set in a bakery.", category: "Fiction", timeLimitMs: 60_000 },
  { text: "Pitch a new holiday in one sentence.", category: "Pitch" },
  { text: "Describe a sunset to someone who has never seen the sky.", category: "Description", timeLimitMs: 60_000 },
  { text: "Give the worst possible advice for a first day at work.", category: "Comedy" },
  { text: "Write a haiku about a printer that refuses to print.", category: "Poetry", timeLimitMs: 60_000 },
  { text: "Invent a slogan for a gym run by cats.", category: "Pitch" },
  { text: "Write the last text message sent before the robots took over.", category: "Fiction" },
  { text: "Explain gravity the way a pirate would.", category: "Voice" },
  { text: "Name a band and describe its only hit song.", category: "Comedy" },
  { text: "Write a product review for a time machine with one flaw.", category: "Review", timeLimitMs: 60_000 },
  { text: "Describe your morning as an epic battle.", category: "Voice" },
  { text: "Write a fortune cookie message that is slightly too specific.", category: "Comedy", timeLimitMs: 30_000 },
];

/**
 * Cycles through a fixed list of challenges. Each instance starts at a random
 * offset so consecutive rooms do not all open with the same prompt.
 */
export class StaticChallengeGenerator implements ChallengeGenerator {
  readonly #challenges: readonly StaticChallenge[];
  #cursor: number;

  constructor(
    challenges: readonly StaticChallenge[] = DEFAULT_CHALLENGES,
    startAt: number = Math.floor(Math.random() * challenges.length),
  ) {
    if (challenges.length === 0) {
      throw new Error("Static challenge pool must not be empty");
    }
    this.#challenges = challenges;
    this.#cursor = startAt % challenges.length;
  }

  async next(): Promise<ChallengeDraft> {
    const challenge = this.#challenges[this.#cursor % this.#challenges.length];
    this.#cursor += 1;
    if (!challenge) {
      throw new Error("Static challenge pool is empty");
    }

    return {
      text: challenge.text,
      category: challenge.category,
      ...(challenge.timeLimitMs !== undefined ? { timeLimitMs: challenge.timeLimitMs } : {}),
      source: "static",
    };
  }
}
