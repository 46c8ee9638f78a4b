import type { ResponseGenerator, ResponseRequest } from "../core.js";
import type { OpenAIChatClient } from "./OpenAIChatClient.js";

/** Turns a player's rough idea into a polished two or three sentence answer. */
export class OpenAIResponseGenerator implements ResponseGenerator {
  readonly #client: OpenAIChatClient;

  constructor(client: OpenAIChatClient) {
    this.#client = client;
  }

  async generate(request: ResponseRequest, signal?: AbortSignal): Promise<string> {
    return this.#client.complete(
      [
        {
          role: "system",
          content:
            `You are helping ${request.displayName} in a creative prompt game. ` +
            `The challenge is: ${request.challenge} ` +
            "Write a creative, engaging response in 2-3 sentences based on the player's idea. " +
            "Reply with the response text only.",
        },
        { role: "user", content: request.idea },
      ],
      { maxTokens: 150, temperature: 0.8, ...(signal ? { signal } : {}) },
    );
  }
}
