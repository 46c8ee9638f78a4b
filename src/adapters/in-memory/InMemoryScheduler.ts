/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Command } from "../../domain/commands/Command.js";
import { timeoutToCommand } from "../../domain/commands/timeouts.js";
import {
  timeoutKey,
  type RoomTimeout,
  type RoomTimeoutRef,
  type Scheduler,
} from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records pending timeouts and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). Timeouts due at the
 * same instant fire in the order they were scheduled.
 */
interface PendingTimeout {
  readonly timeout: RoomTimeout;
  readonly fireAt: TimePoint;
  readonly sequence: number;
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: Command) => Promise<void> | void;
  #pending = new Map<string, PendingTimeout>();
  #now: TimePoint;
  #sequence = 0;

  constructor(dispatch: (command: Command) => Promise<void> | void, startAt: TimePoint = 0) {
    this.#dispatch = dispatch;
    this.#now = startAt;
  }

  get now(): TimePoint {
    return this.#now;
  }

  /** Timeouts still waiting to fire, earliest first. */
  get pending(): readonly RoomTimeout[] {
    return this.#ordered().map((entry) => entry.timeout);
  }

  async scheduleTimeout(timeout: RoomTimeout, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    this.#pending.set(timeoutKey(timeout), {
      timeout,
      fireAt: this.#now + delayMs,
      sequence: this.#sequence++,
    });
  }

  async cancelTimeout(ref: RoomTimeoutRef): Promise<void> {
    this.#pending.delete(timeoutKey(ref));
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#now + milliseconds;

    for (;;) {
      const [next] = this.#ordered();
      if (!next || next.fireAt > targetTime) {
        break;
      }

      this.#pending.delete(timeoutKey(next.timeout));
      this.#now = next.fireAt;
      await this.#dispatch(timeoutToCommand(next.timeout, next.fireAt));
    }

    this.#now = targetTime;
  }

  #ordered(): PendingTimeout[] {
    return [...this.#pending.values()].sort(
      (a, b) => a.fireAt - b.fireAt || a.sequence - b.sequence,
    );
  }
}
