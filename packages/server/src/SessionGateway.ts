/* eslint-disable functional/immutable-data */
import {
  ActionRejectedError,
  CastVote,
  ContinueGame,
  CreateRoom,
  DisconnectPlayer,
  EndGame,
  GameCommandInputError,
  JoinRoom,
  KeyedTaskQueue,
  LeaveRoom,
  ListRooms,
  RejoinRoom,
  RenamePlayer,
  RequestAssist,
  StartGame,
  SubmitResponse,
  dispatchCommand,
  type Command,
  type CommandContext,
  type ConnectionId,
  type Logger,
  type MessageBus,
  type RoomMembership,
  type ServerEvent,
  type TimePoint,
} from "./core.js";
import { parseClientIntent, type ClientIntent } from "./protocol.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
) => Promise<TResult>;

export interface SessionGatewayOptions {
  readonly bus: MessageBus;
  readonly createContext: () => CommandContext;
  readonly dispatch?: DispatchCommand;
  readonly logger?: Logger;
  readonly now?: () => TimePoint;
}

interface Session {
  readonly connectionId: ConnectionId;
  membership?: RoomMembership;
}

type RoomIntent = Exclude<
  ClientIntent,
  { type: "CreateRoom" | "JoinRoom" | "RejoinRoom" | "LeaveRoom" | "ListRooms" }
>;

/**
 * One session per socket. Frames from a connection are handled strictly in
 * arrival order; a failure is reported to that connection alone and never
 * escapes {@link receive}.
 */
export class SessionGateway {
  #sessions = new Map<ConnectionId, Session>();
  readonly #queue = new KeyedTaskQueue();
  readonly #bus: MessageBus;
  readonly #createContext: () => CommandContext;
  readonly #dispatch: DispatchCommand;
  readonly #logger: Logger | undefined;
  readonly #now: () => TimePoint;

  constructor(options: SessionGatewayOptions) {
    this.#bus = options.bus;
    this.#createContext = options.createContext;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  get size(): number {
    return this.#sessions.size;
  }

  membership(connectionId: ConnectionId): RoomMembership | undefined {
    return this.#sessions.get(connectionId)?.membership;
  }

  async open(connectionId: ConnectionId): Promise<void> {
    this.#sessions.set(connectionId, { connectionId });
    await this.#send(connectionId, { type: "Welcome", connectionId });
  }

  async receive(connectionId: ConnectionId, raw: string): Promise<void> {
    await this.#queue.runExclusive(connectionId, () => this.#handle(connectionId, raw));
  }

  /** The socket is gone; the player keeps their seat for the grace window. */
  async close(connectionId: ConnectionId): Promise<void> {
    await this.#queue.runExclusive(connectionId, async () => {
      const session = this.#sessions.get(connectionId);
      this.#sessions.delete(connectionId);
      const membership = session?.membership;
      if (!membership) return;

      try {
        await this.#run(
          new DisconnectPlayer(membership.roomCode, membership.playerId, connectionId, this.#now()),
        );
      } catch (error) {
        this.#logger?.error("Failed to record disconnect", { connectionId, error });
      }
    });
  }

  async #handle(connectionId: ConnectionId, raw: string): Promise<void> {
    const session = this.#sessions.get(connectionId);
    if (!session) {
      this.#logger?.warn("Message from unknown connection dropped", { connectionId });
      return;
    }

    const parsed = parseClientIntent(raw);
    if (!parsed.ok) {
      await this.#reply(connectionId, {
        type: "ActionRejected",
        reason: "InvalidInput",
        message: parsed.message,
        ...(parsed.intent !== undefined ? { intent: parsed.intent } : {}),
      });
      return;
    }

    try {
      await this.#route(session, parsed.intent);
    } catch (error) {
      await this.#reply(connectionId, this.#rejection(error, parsed.intent.type));
    }
  }

  async #route(session: Session, intent: ClientIntent): Promise<void> {
    const { connectionId } = session;
    const at = this.#now();

    switch (intent.type) {
      case "CreateRoom": {
        const command = new CreateRoom(intent.displayName, connectionId, at, intent.roomName);
        await this.#moveTo(session, await this.#run(command));
        return;
      }
      case "JoinRoom": {
        const current = session.membership;
        if (current && current.roomCode === intent.code.trim().toUpperCase()) {
          const { roomCode, playerId } = current;
          await this.#run(
            new RenamePlayer(roomCode, playerId, intent.displayName, at, connectionId),
          );
          return;
        }
        const command = new JoinRoom(intent.code, intent.displayName, connectionId, at);
        await this.#moveTo(session, await this.#run(command));
        return;
      }
      case "RejoinRoom": {
        const current = session.membership;
        if (
          current &&
          current.roomCode === intent.code.trim().toUpperCase() &&
          current.playerId !== intent.playerId
        ) {
          throw ActionRejectedError.because(
            "InvalidInput",
            `Already seated in room ${current.roomCode} as ${current.playerId}`,
          );
        }
        const membership = await this.#run(
          new RejoinRoom(intent.code, intent.playerId, intent.resumeToken, connectionId, at),
        );
        this.#releaseReplacedSessions(session, membership);
        await this.#moveTo(session, membership);
        return;
      }
      case "LeaveRoom": {
        const membership = this.#requireMembership(session);
        await this.#run(
          new LeaveRoom(membership.roomCode, membership.playerId, connectionId, at),
        );
        delete session.membership;
        return;
      }
      case "ListRooms": {
        const rooms = await this.#run(new ListRooms(at));
        await this.#send(connectionId, { type: "RoomList", rooms });
        return;
      }
      default:
        await this.#run(
          this.#roomCommand(this.#requireMembership(session), intent, connectionId, at),
        );
    }
  }

  #roomCommand(
    membership: RoomMembership,
    intent: RoomIntent,
    connectionId: ConnectionId,
    at: TimePoint,
  ): Command {
    const { roomCode, playerId } = membership;

    switch (intent.type) {
      case "Rename":
        return new RenamePlayer(roomCode, playerId, intent.displayName, at, connectionId);
      case "StartGame":
        return new StartGame(roomCode, playerId, at, connectionId);
      case "SubmitResponse":
        return new SubmitResponse(roomCode, playerId, intent.text, at, connectionId);
      case "RequestAssist":
        return new RequestAssist(roomCode, playerId, intent.idea, at, connectionId);
      case "CastVote":
        return new CastVote(roomCode, playerId, intent.targetPlayerId, at, connectionId);
      case "ContinueGame":
        return new ContinueGame(roomCode, playerId, at, connectionId);
      case "EndGame":
        return new EndGame(roomCode, playerId, at, connectionId);
    }
  }

  /**
   * Adopt a seat that was already taken, then give up the previous one. A
   * failed join never reaches this point, so the old seat survives it.
   */
  async #moveTo(session: Session, next: RoomMembership): Promise<void> {
    const previous = session.membership;
    session.membership = next;

    if (
      !previous ||
      (previous.roomCode === next.roomCode && previous.playerId === next.playerId)
    ) {
      return;
    }

    try {
      await this.#run(
        new LeaveRoom(previous.roomCode, previous.playerId, session.connectionId, this.#now()),
      );
    } catch (error) {
      if (!(error instanceof ActionRejectedError)) throw error;
      this.#logger?.debug("Previous seat already gone", {
        connectionId: session.connectionId,
        roomCode: previous.roomCode,
        reason: error.reason,
      });
    }
  }

  /** Other sockets that spoke for the resumed player lose their seat. */
  #releaseReplacedSessions(current: Session, membership: RoomMembership): void {
    for (const session of this.#sessions.values()) {
      if (
        session !== current &&
        session.membership?.roomCode === membership.roomCode &&
        session.membership.playerId === membership.playerId
      ) {
        delete session.membership;
      }
    }
  }

  #requireMembership(session: Session): RoomMembership {
    if (!session.membership) {
      throw ActionRejectedError.because("PlayerNotInRoom", "Join a room first");
    }
    return session.membership;
  }

  #rejection(error: unknown, intent: string): ServerEvent {
    if (error instanceof ActionRejectedError) {
      return { type: "ActionRejected", reason: error.reason, message: error.message, intent };
    }

    if (error instanceof GameCommandInputError) {
      return { type: "ActionRejected", reason: "InvalidInput", message: error.message, intent };
    }

    this.#logger?.error("Unhandled error while processing intent", { intent, error });
    return {
      type: "ActionRejected",
      reason: "InternalError",
      message: "The server could not process this action",
      intent,
    };
  }

  async #run<TResult>(command: Command<TResult>): Promise<TResult> {
    return this.#dispatch(command, this.#createContext());
  }

  async #reply(connectionId: ConnectionId, event: ServerEvent): Promise<void> {
    try {
      await this.#send(connectionId, event);
    } catch (error) {
      this.#logger?.error("Failed to reply to connection", { connectionId, error });
    }
  }

  async #send(connectionId: ConnectionId, event: ServerEvent): Promise<void> {
    await this.#bus.send(connectionId, event);
  }
}
