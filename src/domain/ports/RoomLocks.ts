import type { RoomCode } from "../typedefs.js";

/**
 * Serialization boundary of a room. Tasks for the same code run one at a
 * time in arrival order; tasks for different codes do not wait on each other.
 * A task must not request the lock it is already running under.
 */
export interface RoomLocks {
  runExclusive<T>(code: RoomCode, task: () => Promise<T>): Promise<T>;
}
