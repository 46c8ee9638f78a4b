export type RejectionReason =
  | "RoomNotFound"
  | "RoomFull"
  | "InvalidPhaseForAction"
  | "DuplicateSubmission"
  | "InvalidVoteTarget"
  | "PlayerNotInRoom"
  | "NotEnoughPlayers"
  | "InvalidInput";

/**
 * A single action was refused. The room is left untouched and only the
 * originating connection hears about it.
 */
export class ActionRejectedError extends Error {
  constructor(
    public readonly reason: RejectionReason,
    message: string,
  ) {
    super(message);
    this.name = "ActionRejectedError";
  }

  static because(reason: RejectionReason, message: string): ActionRejectedError {
    return new ActionRejectedError(reason, message);
  }
}
