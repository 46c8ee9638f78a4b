/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type {
  Command,
  CommandContext,
  Logger,
  RoomTimeout,
  RoomTimeoutRef,
  Scheduler,
  TimePoint,
} from "../core.js";
import { dispatchCommand, timeoutKey, timeoutToCommand } from "../core.js";

type Dispatch = (command: Command, ctx: CommandContext) => Promise<unknown>;

interface RealSchedulerOptions {
  readonly dispatch?: Dispatch;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
  readonly now?: () => TimePoint;
}

/** Wall-clock {@link Scheduler} on top of `setTimeout`. */
export class RealScheduler implements Scheduler {
  #timers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: Dispatch;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;
  readonly #now: () => TimePoint;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  get size(): number {
    return this.#timers.size;
  }

  async scheduleTimeout(timeout: RoomTimeout, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const key = timeoutKey(timeout);
    const existing = this.#timers.get(key);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(key);
      this.#logger?.debug("Rescheduling timeout", { key, delayMs });
    }

    const timer = setTimeout(async () => {
      if (this.#timers.get(key) !== timer) return;
      this.#timers.delete(key);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(timeoutToCommand(timeout, this.#now()), context);
      } catch (error) {
        this.#logger?.error("Failed to dispatch scheduled timeout", { key, error });
      }
    }, delayMs);

    this.#timers.set(key, timer);
    this.#logger?.debug("Timeout scheduled", { key, delayMs });
  }

  async cancelTimeout(ref: RoomTimeoutRef): Promise<void> {
    const key = timeoutKey(ref);
    const timer = this.#timers.get(key);
    if (!timer) return;

    clearTimeout(timer);
    this.#timers.delete(key);
    this.#logger?.debug("Timeout cancelled", { key });
  }

  /** Drop every pending timer, e.g. on shutdown. */
  dispose(): void {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
