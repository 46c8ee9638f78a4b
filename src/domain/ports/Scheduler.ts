import type { PlayerId, RoomCode, TimedPhase } from "../typedefs.js";

export type RoomTimeout =
  | {
      readonly kind: "phase";
      readonly roomCode: RoomCode;
      readonly phase: TimedPhase;
      readonly roundNumber: number;
    }
  | { readonly kind: "grace"; readonly roomCode: RoomCode; readonly playerId: PlayerId }
  | { readonly kind: "closure"; readonly roomCode: RoomCode };

/** Enough of a {@link RoomTimeout} to identify the live timer it occupies */
export type RoomTimeoutRef =
  | { readonly kind: "phase"; readonly roomCode: RoomCode }
  | { readonly kind: "grace"; readonly roomCode: RoomCode; readonly playerId: PlayerId }
  | { readonly kind: "closure"; readonly roomCode: RoomCode };

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Each timeout occupies one slot identified by {@link timeoutKey}: a room has one phase timer and
 * one closure timer, each player one grace timer. Scheduling into an occupied slot replaces the
 * live timer. Cancelling an empty slot, including one whose timer already fired, is a no-op.
 */
export interface Scheduler {
  scheduleTimeout(timeout: RoomTimeout, delayMs: number): Promise<void>;
  cancelTimeout(ref: RoomTimeoutRef): Promise<void>;
}

export function timeoutKey(ref: RoomTimeoutRef): string {
  switch (ref.kind) {
    case "phase":
      return `${ref.roomCode}:phase`;
    case "closure":
      return `${ref.roomCode}:closure`;
    case "grace":
      return `${ref.roomCode}:grace:${ref.playerId}`;
  }
}
