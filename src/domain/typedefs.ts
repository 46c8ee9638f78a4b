/**
 * Core domain typedefs used throughout the game.
 * Plain aliases; the room gateway and commands give them meaning.
 */

/** Human-typeable identifier of a room */
export type RoomCode = string;

/** Identifier of a player, unique within its room */
export type PlayerId = string;

/** Identifier of one client connection */
export type ConnectionId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Room phase enumeration */
export type RoomPhase = "lobby" | "challenge" | "voting" | "results" | "closed";

/** Phases that run against a deadline */
export type TimedPhase = Extract<RoomPhase, "challenge" | "voting">;
