export { ActionRejectedError, type RejectionReason } from "./ActionRejectedError.js";
export { ExternalCallTimeoutError } from "./ExternalCallTimeoutError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { InvalidRoomStateError } from "./InvalidRoomStateError.js";
export { RoomCodeExhaustedError } from "./RoomCodeExhaustedError.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
