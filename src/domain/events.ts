import type { RejectionReason } from "./errors/ActionRejectedError.js";
import type { RoomSummary, RoundResult } from "./ports/RoomGateway.js";
import type {
  ConnectionId,
  PlayerId,
  RoomCode,
  RoomPhase,
  TimePoint,
} from "./typedefs.js";

export interface PlayerView {
  readonly id: PlayerId;
  readonly displayName: string;
  readonly connected: boolean;
  readonly score: number;
  readonly responded: boolean;
  readonly voted: boolean;
}

export interface BallotEntry {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly text: string;
}

/** Full view of a room, identical for every member. */
export interface RoomSnapshot {
  readonly type: "RoomSnapshot";
  readonly code: RoomCode;
  readonly name: string;
  readonly revision: number;
  readonly phase: RoomPhase;
  readonly roundNumber: number;
  readonly players: readonly PlayerView[];
  readonly challenge?: {
    readonly text: string;
    readonly category: string;
    readonly roundNumber: number;
  };
  readonly deadline?: TimePoint;
  readonly responsesSubmittedCount: number;
  readonly votesCastCount: number;
  /** Non-empty responses in submission order; voting and results only */
  readonly ballot?: readonly BallotEntry[];
  readonly results?: readonly RoundResult[];
}

export interface PhaseChanged {
  readonly type: "PhaseChanged";
  readonly code: RoomCode;
  readonly phase: RoomPhase;
  readonly roundNumber: number;
  readonly deadline?: TimePoint;
  readonly at: TimePoint;
}

export interface RoomClosed {
  readonly type: "RoomClosed";
  readonly code: RoomCode;
  readonly at: TimePoint;
}

export interface Welcome {
  readonly type: "Welcome";
  readonly connectionId: ConnectionId;
}

export interface Joined {
  readonly type: "Joined";
  readonly code: RoomCode;
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly resumeToken: string;
}

export interface LeftRoom {
  readonly type: "LeftRoom";
  readonly code: RoomCode;
}

export interface ActionRejected {
  readonly type: "ActionRejected";
  readonly reason: RejectionReason | "InternalError";
  readonly message: string;
  readonly intent?: string;
}

export interface RoomList {
  readonly type: "RoomList";
  readonly rooms: readonly RoomSummary[];
}

export interface AssistReady {
  readonly type: "AssistReady";
  readonly roundNumber: number;
  readonly text: string;
}

export interface AssistUnavailable {
  readonly type: "AssistUnavailable";
  readonly reason: string;
}

export type ServerEvent =
  | RoomSnapshot
  | PhaseChanged
  | RoomClosed
  | Welcome
  | Joined
  | LeftRoom
  | ActionRejected
  | RoomList
  | AssistReady
  | AssistUnavailable;
