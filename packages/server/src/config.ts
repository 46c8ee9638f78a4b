import { z } from "zod";

import { createGameConfig, validateGameConfig, type GameConfig } from "./core.js";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }

  static because(issues: readonly string[]): ConfigurationError {
    return new ConfigurationError(`Invalid server configuration: ${issues.join("; ")}`, issues);
  }
}

export interface ServerConfig {
  readonly port: number;
  /** Absent when AI features are disabled */
  readonly openAiApiKey?: string;
  readonly openAiModel: string;
  readonly game: GameConfig;
}

export const DEFAULT_PORT = 8787;
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

const optionalInteger = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a whole number")
    .transform(Number)
    .pipe(z.number().int().min(min).max(max))
    .optional();

const EnvSchema = z.object({
  PORT: optionalInteger(1, 65_535),
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: z.string().trim().min(1).optional(),
  CHALLENGE_DURATION_MS: optionalInteger(1),
  VOTING_DURATION_MS: optionalInteger(1),
  GRACE_WINDOW_MS: optionalInteger(0),
});

/** Read the process environment once at startup. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw ConfigurationError.because(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`),
    );
  }

  const values = parsed.data;
  const game = createGameConfig({
    ...(values.CHALLENGE_DURATION_MS !== undefined
      ? { challengeDurationMs: values.CHALLENGE_DURATION_MS }
      : {}),
    ...(values.VOTING_DURATION_MS !== undefined
      ? { votingDurationMs: values.VOTING_DURATION_MS }
      : {}),
    ...(values.GRACE_WINDOW_MS !== undefined ? { graceWindowMs: values.GRACE_WINDOW_MS } : {}),
  });

  const issues = validateGameConfig(game);
  if (issues.length > 0) {
    throw ConfigurationError.because(issues);
  }

  const apiKey = values.OPENAI_API_KEY;

  return {
    port: values.PORT ?? DEFAULT_PORT,
    ...(apiKey ? { openAiApiKey: apiKey } : {}),
    openAiModel: values.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
    game,
  };
}
