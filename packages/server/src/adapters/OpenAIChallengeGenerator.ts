import { z } from "zod";

import type { ChallengeDraft, ChallengeGenerator } from "../core.js";
import type { OpenAIChatClient } from "./OpenAIChatClient.js";

const GeneratedChallengeSchema = z.object({
  text: z.string().trim().min(1).max(300),
  category: z.string().trim().min(1).max(40).catch("Freestyle"),
});

const SYSTEM_PROMPT =
  "You write prompts for a party game where players answer a short creative-writing " +
  'challenge in one or two sentences. Reply with JSON: {"text": string, "category": string}. ' +
  "Keep the challenge under 25 words, playful and open-ended.";

export class OpenAIChallengeGenerator implements ChallengeGenerator {
  readonly #client: OpenAIChatClient;

  constructor(client: OpenAIChatClient) {
    this.#client = client;
  }

  async next(roundNumber: number, signal?: AbortSignal): Promise<ChallengeDraft> {
    const content = await this.#client.complete(
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: `Write the challenge for round ${roundNumber}.` },
      ],
      { json: true, maxTokens: 120, ...(signal ? { signal } : {}) },
    );

    const challenge = GeneratedChallengeSchema.parse(JSON.parse(content));

    return {
      text: challenge.text,
      category: challenge.category,
      source: "generated",
    };
  }
}
