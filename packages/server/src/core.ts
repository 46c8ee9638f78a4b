export type {
  Command,
  CommandContext,
} from "@promptfall/core/domain/commands/Command.js";
export { CastVote } from "@promptfall/core/domain/commands/CastVote.js";
export { ContinueGame } from "@promptfall/core/domain/commands/ContinueGame.js";
export { CreateRoom } from "@promptfall/core/domain/commands/CreateRoom.js";
export { DisconnectPlayer } from "@promptfall/core/domain/commands/DisconnectPlayer.js";
export { EndGame } from "@promptfall/core/domain/commands/EndGame.js";
export { JoinRoom } from "@promptfall/core/domain/commands/JoinRoom.js";
export { LeaveRoom } from "@promptfall/core/domain/commands/LeaveRoom.js";
export { ListRooms } from "@promptfall/core/domain/commands/ListRooms.js";
export type { RoomMembership } from "@promptfall/core/domain/commands/Membership.js";
export { PhaseTimeout } from "@promptfall/core/domain/commands/PhaseTimeout.js";
export { RejoinRoom } from "@promptfall/core/domain/commands/RejoinRoom.js";
export { RenamePlayer } from "@promptfall/core/domain/commands/RenamePlayer.js";
export { RequestAssist } from "@promptfall/core/domain/commands/RequestAssist.js";
export { StartGame } from "@promptfall/core/domain/commands/StartGame.js";
export { SubmitResponse } from "@promptfall/core/domain/commands/SubmitResponse.js";
export { timeoutToCommand } from "@promptfall/core/domain/commands/timeouts.js";
export { dispatchCommand } from "@promptfall/core/domain/commands/dispatchCommand.js";
export { toSnapshot } from "@promptfall/core/domain/entities/RoomRules.js";
export {
  ActionRejectedError,
  GameCommandInputError,
  type RejectionReason,
} from "@promptfall/core/domain/errors/index.js";
export type { ServerEvent } from "@promptfall/core/domain/events.js";
export type { GameConfig, GameConfigOverrides } from "@promptfall/core/domain/GameConfig.js";
export { createGameConfig, validateGameConfig } from "@promptfall/core/domain/GameConfig.js";
export type { ChallengeGenerator } from "@promptfall/core/domain/ports/ChallengeGenerator.js";
export type { Logger } from "@promptfall/core/domain/ports/Logger.js";
export type { MessageBus } from "@promptfall/core/domain/ports/MessageBus.js";
export type {
  ResponseGenerator,
  ResponseRequest,
} from "@promptfall/core/domain/ports/ResponseGenerator.js";
export type {
  ChallengeDraft,
  RoomGateway,
  RoomState,
} from "@promptfall/core/domain/ports/RoomGateway.js";
export type { RoomLocks } from "@promptfall/core/domain/ports/RoomLocks.js";
export {
  timeoutKey,
  type RoomTimeout,
  type RoomTimeoutRef,
  type Scheduler,
} from "@promptfall/core/domain/ports/Scheduler.js";
export type {
  ConnectionId,
  PlayerId,
  RoomCode,
  TimePoint,
} from "@promptfall/core/domain/typedefs.js";
export { InMemoryRoomGateway } from "@promptfall/core/adapters/in-memory/InMemoryRoomGateway.js";
export { KeyedTaskQueue } from "@promptfall/core/adapters/in-memory/KeyedTaskQueue.js";
export { StaticChallengeGenerator } from "@promptfall/core/adapters/static/StaticChallengeGenerator.js";
