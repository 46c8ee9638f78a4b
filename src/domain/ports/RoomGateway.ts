/* eslint-disable functional/prefer-readonly-type */
import type {
  ConnectionId,
  PlayerId,
  RoomCode,
  RoomPhase,
  TimePoint,
} from "../typedefs.js";

export interface Player {
  readonly id: PlayerId;
  displayName: string;
  connected: boolean;
  /** Cumulative across the rounds of this room */
  score: number;
  readonly joinedAt: TimePoint;

  /** Connection currently speaking for this player; absent while disconnected */
  connectionId?: ConnectionId;

  /** Secret that authorises a reconnect; never broadcast */
  readonly resumeToken: string;

  disconnectedAt?: TimePoint;

  /** Set once the grace window lapsed or the player left on purpose */
  evicted: boolean;
}

export interface Challenge {
  readonly text: string;
  readonly category: string;
  readonly roundNumber: number;
  /** Overrides the configured challenge duration for this prompt */
  readonly timeLimitMs?: number;
  readonly source: "static" | "generated";
}

/** A challenge as produced by a generator, before it is bound to a round */
export type ChallengeDraft = Omit<Challenge, "roundNumber">;

export interface SubmittedResponse {
  /** Empty text marks a placeholder for a player who did not respond */
  readonly text: string;
  readonly submittedAt: TimePoint;
  /** Position in submission order within the round */
  readonly order: number;
}

export interface RoundResult {
  readonly rank: number;
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly responseText: string;
  readonly voteCount: number;
  readonly scoreDelta: number;
  readonly cumulativeScore: number;
}

/**
 * The authoritative snapshot of one room. Only commands holding the room's
 * lock may mutate it.
 */
export interface RoomState {
  readonly code: RoomCode;
  /** Shown in the lobby browser */
  readonly name: string;
  readonly createdAt: TimePoint;

  phase: RoomPhase;

  /** Every player who ever joined, in join order */
  players: Player[];

  challenge: Challenge | undefined;

  responses: Record<PlayerId, SubmittedResponse>;

  /** voter → target */
  votes: Record<PlayerId, PlayerId>;

  /** Ranking of the last finished round; present in the results phase */
  results: RoundResult[] | undefined;

  roundNumber: number;

  /** Round being prepared while its challenge is generated */
  pendingRound: number | undefined;

  phaseStartedAt: TimePoint;
  phaseDeadline: TimePoint | undefined;

  /** Incremented on every committed mutation */
  revision: number;
}

export interface RoomSummary {
  readonly code: RoomCode;
  readonly name: string;
  readonly phase: RoomPhase;
  readonly playerCount: number;
  readonly connectedCount: number;
  readonly createdAt: TimePoint;
}

/**
 * The room directory. Lookups normalise codes to upper case. Implementations
 * own the code → room map; callers serialize mutations of a single room
 * through {@link RoomLocks}.
 */
export interface RoomGateway {
  /** Allocate a fresh lobby room under a unique code. */
  createRoom(at: TimePoint, name: string): Promise<RoomState>;

  /** Load a room or throw {@link RoomNotFoundError}. */
  loadRoomState(code: RoomCode): Promise<RoomState>;

  findRoomState(code: RoomCode): Promise<RoomState | undefined>;

  /** Persist a complete room snapshot after validating its invariants. */
  saveRoomState(state: RoomState): Promise<void>;

  removeRoom(code: RoomCode): Promise<void>;

  listRooms(): Promise<readonly RoomSummary[]>;
}
