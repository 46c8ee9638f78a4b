import { Command, type CommandContext } from "./Command.js";
import { callWithTimeout } from "./ExternalCall.js";
import { registryOf, withRoom, withRoomIfPresent } from "./RoomTransaction.js";
import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { ServerEvent } from "../events.js";
import type { RoomState } from "../ports/RoomGateway.js";
import type { ConnectionId, PlayerId, RoomCode, TimePoint } from "../typedefs.js";

interface AssistTarget {
  readonly challenge: string;
  readonly roundNumber: number;
  readonly displayName: string;
}

/**
 * Draft a response from the player's idea. The draft goes to the requester
 * only and is never submitted on their behalf; if it cannot be produced the
 * player is told to type their own.
 */
export class RequestAssist extends Command {
  readonly type = "RequestAssist" as const;

  constructor(
    public readonly roomCode: RoomCode,
    public readonly playerId: PlayerId,
    public readonly idea: string,
    public readonly at: TimePoint,
    public readonly connectionId?: ConnectionId,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const idea = this.idea.trim();

    if (idea.length === 0 || idea.length > ctx.config.maxResponseLength) {
      throw ActionRejectedError.because(
        "InvalidInput",
        `Idea must be between 1 and ${ctx.config.maxResponseLength} characters`,
      );
    }

    const target = await withRoom(ctx, this.roomCode, (state) => this.#target(state, ctx));

    if (!ctx.responseGenerator) {
      await this.#reply(ctx, { type: "AssistUnavailable", reason: "Assistance is not configured" });
      return;
    }

    const generator = ctx.responseGenerator;
    let text: string;
    try {
      text = await callWithTimeout("Response generation", ctx.config.assistTimeoutMs, (signal) =>
        generator.generate(
          { challenge: target.challenge, idea, displayName: target.displayName },
          signal,
        ),
      );
    } catch (error) {
      ctx.logger?.warn("Response generation failed", {
        type: this.type,
        code: this.roomCode,
        playerId: this.playerId,
        error,
      });
      await this.#reply(ctx, { type: "AssistUnavailable", reason: "Assistance failed; type your own" });
      return;
    }

    await this.#reply(ctx, (state) =>
      state.phase === "challenge" &&
      state.roundNumber === target.roundNumber &&
      state.responses[this.playerId] === undefined
        ? {
            type: "AssistReady",
            roundNumber: target.roundNumber,
            text: text.trim().slice(0, ctx.config.maxResponseLength),
          }
        : { type: "AssistUnavailable", reason: "The round moved on" },
    );
  }

  #target(state: RoomState, ctx: CommandContext): AssistTarget {
    const player = registryOf(state, ctx).require(this.playerId, this.connectionId);

    if (state.phase !== "challenge" || !state.challenge) {
      throw ActionRejectedError.because(
        "InvalidPhaseForAction",
        `Cannot request assistance during the ${state.phase} phase`,
      );
    }

    if (state.responses[this.playerId] !== undefined) {
      throw ActionRejectedError.because(
        "DuplicateSubmission",
        "A response was already submitted this round",
      );
    }

    return {
      challenge: state.challenge.text,
      roundNumber: state.roundNumber,
      displayName: player.displayName,
    };
  }

  /** Send to whichever connection currently speaks for the player. */
  async #reply(
    ctx: CommandContext,
    event: ServerEvent | ((state: RoomState) => ServerEvent),
  ): Promise<void> {
    await withRoomIfPresent(ctx, this.roomCode, async (state) => {
      const connectionId = registryOf(state, ctx).find(this.playerId)?.connectionId;
      if (connectionId === undefined) return;
      await ctx.bus.send(connectionId, typeof event === "function" ? event(state) : event);
    });
  }
}
