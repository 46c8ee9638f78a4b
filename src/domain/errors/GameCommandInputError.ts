/**
 * Raised while a command is being constructed, before it ever reaches a room.
 */
export class GameCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid command input")
          : `Invalid command input: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }
}
