import type { RoomCode } from "../typedefs.js";
import { ActionRejectedError } from "./ActionRejectedError.js";

export class RoomNotFoundError extends ActionRejectedError {
  constructor(public readonly code: RoomCode) {
    super("RoomNotFound", `Room not found: ${code}`);
    this.name = "RoomNotFoundError";
  }
}
