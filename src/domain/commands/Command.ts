import type { GameConfig } from "../GameConfig.js";
import type { ChallengeGenerator } from "../ports/ChallengeGenerator.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { ResponseGenerator } from "../ports/ResponseGenerator.js";
import type { RoomGateway } from "../ports/RoomGateway.js";
import type { RoomLocks } from "../ports/RoomLocks.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly roomGateway: RoomGateway;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly locks: RoomLocks;
  readonly challengeGenerator: ChallengeGenerator;
  /** Used whenever {@link challengeGenerator} fails or runs out of time */
  readonly fallbackChallenges: ChallengeGenerator;
  /** Absent when AI assistance is not configured */
  readonly responseGenerator?: ResponseGenerator;
  readonly config: GameConfig;
  readonly logger?: Logger;
  /** Reading of the clock the scheduler runs on */
  readonly now: () => TimePoint;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
