import { z } from "zod";

import type { Logger } from "../core.js";

export interface ChatMessage {
  readonly role: "system" | "user";
  readonly content: string;
}

export interface OpenAIChatClientOptions {
  readonly apiKey: string;
  readonly model?: string;
  readonly baseUrl?: string;
  readonly logger?: Logger;
  readonly fetch?: typeof fetch;
}

export interface CompletionOptions {
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly json?: boolean;
  readonly signal?: AbortSignal;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Minimal client for the chat completions endpoint. */
export class OpenAIChatClient {
  readonly #apiKey: string;
  readonly #model: string;
  readonly #baseUrl: string;
  readonly #logger: Logger | undefined;
  readonly #fetch: typeof fetch;

  constructor({
    apiKey,
    model = "gpt-4o-mini",
    baseUrl = "https://api.openai.com/v1",
    logger,
    fetch: fetchImpl = globalThis.fetch,
  }: OpenAIChatClientOptions) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY is required for chat completions");
    }

    this.#apiKey = apiKey;
    this.#model = model;
    this.#baseUrl = baseUrl;
    this.#logger = logger;
    this.#fetch = fetchImpl;
  }

  async complete(
    messages: readonly ChatMessage[],
    { maxTokens = 200, temperature = 0.9, json = false, signal }: CompletionOptions = {},
  ): Promise<string> {
    const response = await this.#fetch(`${this.#baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.#apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.#model,
        messages,
        max_tokens: maxTokens,
        temperature,
        ...(json ? { response_format: { type: "json_object" } } : {}),
      }),
      ...(signal ? { signal } : {}),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI chat completion failed: ${response.status} ${text}`);
    }

    const payload = ChatCompletionSchema.parse(await response.json());
    const content = payload.choices[0]?.message.content?.trim();

    if (!content) {
      throw new Error("OpenAI response did not include any content");
    }

    this.#logger?.debug("Chat completion received", { model: this.#model });
    return content;
  }
}
