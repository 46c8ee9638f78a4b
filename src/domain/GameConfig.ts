export interface GameConfig {
  readonly minPlayers: number;
  readonly maxPlayers: number;
  readonly challengeDurationMs: number;
  readonly votingDurationMs: number;
  /** Early advance never ends a phase sooner than this after it started. */
  readonly minPhaseDurationMs: number;
  /** Debounce between full participation and the early transition. */
  readonly earlyAdvanceDelayMs: number;
  readonly graceWindowMs: number;
  readonly generatorTimeoutMs: number;
  readonly assistTimeoutMs: number;
  readonly maxResponseLength: number;
  readonly maxDisplayNameLength: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    minPlayers: overrides.minPlayers ?? 2,
    maxPlayers: overrides.maxPlayers ?? 8,
    challengeDurationMs: overrides.challengeDurationMs ?? 45_000,
    votingDurationMs: overrides.votingDurationMs ?? 20_000,
    minPhaseDurationMs: overrides.minPhaseDurationMs ?? 5_000,
    earlyAdvanceDelayMs: overrides.earlyAdvanceDelayMs ?? 1_500,
    graceWindowMs: overrides.graceWindowMs ?? 30_000,
    generatorTimeoutMs: overrides.generatorTimeoutMs ?? 5_000,
    assistTimeoutMs: overrides.assistTimeoutMs ?? 8_000,
    maxResponseLength: overrides.maxResponseLength ?? 500,
    maxDisplayNameLength: overrides.maxDisplayNameLength ?? 24,
  };
}

export function validateGameConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (!Number.isInteger(config.minPlayers) || config.minPlayers < 1) {
    issues.push("minPlayers must be an integer greater than or equal to 1");
  }

  if (!Number.isInteger(config.maxPlayers) || config.maxPlayers < config.minPlayers) {
    issues.push("maxPlayers must be an integer not below minPlayers");
  }

  if (!isPositiveDuration(config.challengeDurationMs)) {
    issues.push("challengeDurationMs must be greater than 0");
  }

  if (!isPositiveDuration(config.votingDurationMs)) {
    issues.push("votingDurationMs must be greater than 0");
  }

  if (!isNonNegativeDuration(config.minPhaseDurationMs)) {
    issues.push("minPhaseDurationMs must not be negative");
  }

  if (!isNonNegativeDuration(config.earlyAdvanceDelayMs)) {
    issues.push("earlyAdvanceDelayMs must not be negative");
  }

  if (!isNonNegativeDuration(config.graceWindowMs)) {
    issues.push("graceWindowMs must not be negative");
  }

  if (!isPositiveDuration(config.generatorTimeoutMs)) {
    issues.push("generatorTimeoutMs must be greater than 0");
  }

  if (!isPositiveDuration(config.assistTimeoutMs)) {
    issues.push("assistTimeoutMs must be greater than 0");
  }

  if (!Number.isInteger(config.maxResponseLength) || config.maxResponseLength < 1) {
    issues.push("maxResponseLength must be a positive integer");
  }

  if (!Number.isInteger(config.maxDisplayNameLength) || config.maxDisplayNameLength < 1) {
    issues.push("maxDisplayNameLength must be a positive integer");
  }

  return issues;
}

function isPositiveDuration(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isNonNegativeDuration(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}
