import { describe, expect, it, vi } from "vitest";

import {
  createServerTestContext,
  framesOf,
  lastFrameOf,
} from "./support/testContext.js";

describe("SessionGateway", () => {
  it("greets a new connection with its id", async () => {
    const server = createServerTestContext();

    const socket = await server.connect("c1");

    expect(framesOf(socket)).toEqual([{ type: "Welcome", connectionId: "c1" }]);
    expect(server.sessions.size).toBe(1);
  });

  it("creates a room and remembers the membership", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });

    const membership = server.sessions.membership("c1");
    expect(membership).toMatchObject({ roomCode: "ROOM1", playerId: "p1" });
    expect(framesOf(socket)).toEqual([
      { type: "Welcome", connectionId: "c1" },
      {
        type: "Joined",
        code: "ROOM1",
        playerId: "p1",
        displayName: "Ann",
        resumeToken: membership?.resumeToken,
      },
      expect.objectContaining({ type: "RoomSnapshot", code: "ROOM1", revision: 1 }),
    ]);
  });

  it("reports a frame that is not JSON", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.sessions.receive("c1", "{nope");

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "InvalidInput",
      message: "Message is not valid JSON",
    });
  });

  it("reports a malformed intent with its type", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.say("c1", { type: "JoinRoom", code: "ROOM1" });

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "InvalidInput",
      message: "displayName: Required",
      intent: "JoinRoom",
    });
  });

  it("refuses room actions before the connection joined a room", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.say("c1", { type: "StartGame" });

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "PlayerNotInRoom",
      message: "Join a room first",
      intent: "StartGame",
    });
  });

  it("turns a command input error into an InvalidInput rejection", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.say("c1", { type: "JoinRoom", code: "??", displayName: "Ben" });

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "InvalidInput",
      message: "Room code must be 4-8 letters or digits",
      intent: "JoinRoom",
    });
  });

  it("hides unexpected failures behind an InternalError", async () => {
    const server = createServerTestContext({
      dispatch: vi.fn().mockRejectedValue(new Error("disk on fire")),
    });
    const socket = await server.connect("c1");

    await server.say("c1", { type: "ListRooms" });

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "InternalError",
      message: "The server could not process this action",
      intent: "ListRooms",
    });
    expect(server.logger.error).toHaveBeenCalledWith(
      "Unhandled error while processing intent",
      expect.objectContaining({ intent: "ListRooms" }),
    );
  });

  it("handles a connection's frames in arrival order", async () => {
    const server = createServerTestContext();
    await server.connect("c1");

    await Promise.all([
      server.say("c1", { type: "CreateRoom", displayName: "Ann" }),
      server.say("c1", { type: "Rename", displayName: "Annie" }),
    ]);

    const room = await server.roomGateway.loadRoomState("ROOM1");
    expect(room.players.map((player) => player.displayName)).toEqual(["Annie"]);
  });

  it("plays through joining and starting a round", async () => {
    const server = createServerTestContext();
    const ann = await server.connect("c1");
    const ben = await server.connect("c2");

    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "room1", displayName: "Ben" });
    await server.say("c2", { type: "StartGame" });

    const phaseChanged = {
      type: "PhaseChanged",
      code: "ROOM1",
      phase: "challenge",
      roundNumber: 1,
      deadline: 45_000,
      at: 0,
    };
    expect(lastFrameOf(ann)).toEqual(phaseChanged);
    expect(lastFrameOf(ben)).toEqual(phaseChanged);
  });

  it("lists joinable rooms to the asking connection", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    const browser = await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });

    await server.say("c2", { type: "ListRooms" });

    expect(lastFrameOf(browser)).toEqual({
      type: "RoomList",
      rooms: [
        {
          code: "ROOM1",
          name: "New Room",
          phase: "lobby",
          playerCount: 1,
          connectedCount: 1,
          createdAt: 0,
        },
      ],
    });
  });

  it("gives up the current seat once another room was created", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });

    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });

    expect(framesOf(socket)).toContainEqual({ type: "LeftRoom", code: "ROOM1" });
    expect(server.sessions.membership("c1")).toMatchObject({ roomCode: "ROOM2" });
    expect(server.bus.members("room:ROOM1")).toEqual([]);
    expect(server.scheduler.pending).toEqual([{ kind: "closure", roomCode: "ROOM1" }]);
  });

  it("keeps the current seat when joining another room fails", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    const ben = await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });

    await server.say("c2", { type: "JoinRoom", code: "NOPE9", displayName: "Ben" });

    expect(lastFrameOf(ben)).toEqual({
      type: "ActionRejected",
      reason: "RoomNotFound",
      message: "Room not found: NOPE9",
      intent: "JoinRoom",
    });
    expect(server.sessions.membership("c2")).toMatchObject({ roomCode: "ROOM1", playerId: "p2" });
    const room = await server.roomGateway.loadRoomState("ROOM1");
    expect(room.players.map((player) => [player.id, player.evicted])).toEqual([
      ["p1", false],
      ["p2", false],
    ]);
    expect(server.bus.members("room:ROOM1")).toEqual(["c1", "c2"]);
  });

  it("keeps the current seat when creating another room fails", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });

    await server.say("c1", {
      type: "CreateRoom",
      displayName: "A name far too long for any scoreboard",
    });

    expect(lastFrameOf(socket)).toEqual({
      type: "ActionRejected",
      reason: "InvalidInput",
      message: "Display name must be at most 24 characters",
      intent: "CreateRoom",
    });
    expect(server.sessions.membership("c1")).toMatchObject({ roomCode: "ROOM1", playerId: "p1" });
    const rooms = await server.roomGateway.listRooms();
    expect(rooms.map((room) => room.code)).toEqual(["ROOM1"]);
    expect(server.scheduler.pending).toEqual([]);
  });

  it("treats a join to the current room as a rename", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });

    await server.say("c2", { type: "JoinRoom", code: "room1", displayName: "Benji" });

    expect(server.sessions.membership("c2")).toMatchObject({ roomCode: "ROOM1", playerId: "p2" });
    const room = await server.roomGateway.loadRoomState("ROOM1");
    expect(room.players.map((player) => [player.id, player.displayName, player.evicted])).toEqual([
      ["p1", "Ann", false],
      ["p2", "Benji", false],
    ]);
  });

  it("names a created room", async () => {
    const server = createServerTestContext();
    const socket = await server.connect("c1");

    await server.say("c1", { type: "CreateRoom", displayName: "Ann", roomName: "Late show" });

    expect(lastFrameOf(socket)).toMatchObject({
      type: "RoomSnapshot",
      code: "ROOM1",
      name: "Late show",
    });
  });

  it("marks the player disconnected when the socket closes", async () => {
    const server = createServerTestContext();
    const ann = await server.connect("c1");
    await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });

    await server.sessions.close("c2");

    expect(server.sessions.size).toBe(1);
    expect(lastFrameOf(ann)).toMatchObject({
      type: "RoomSnapshot",
      players: [
        { id: "p1", connected: true },
        { id: "p2", connected: false },
      ],
    });
    expect(server.scheduler.pending).toEqual([
      { kind: "grace", roomCode: "ROOM1", playerId: "p2" },
    ]);
  });

  it("resumes a player on a new socket with the resume token", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });
    const token = server.sessions.membership("c2")?.resumeToken ?? "";
    await server.sessions.close("c2");

    const ben = await server.connect("c3");
    await server.say("c3", {
      type: "RejoinRoom",
      code: "ROOM1",
      playerId: "p2",
      resumeToken: token,
    });

    expect(server.sessions.membership("c3")).toEqual({
      roomCode: "ROOM1",
      playerId: "p2",
      resumeToken: token,
    });
    expect(lastFrameOf(ben)).toMatchObject({
      type: "RoomSnapshot",
      players: [
        { id: "p1", connected: true },
        { id: "p2", connected: true },
      ],
    });
    expect(server.scheduler.pending).toEqual([]);
  });

  it("strips the seat from a socket whose player resumed elsewhere", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    const stale = await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });
    const token = server.sessions.membership("c2")?.resumeToken ?? "";

    await server.connect("c3");
    await server.say("c3", {
      type: "RejoinRoom",
      code: "ROOM1",
      playerId: "p2",
      resumeToken: token,
    });
    await server.say("c2", { type: "LeaveRoom" });

    expect(server.sessions.membership("c2")).toBeUndefined();
    expect(framesOf(stale)).toContainEqual({ type: "LeftRoom", code: "ROOM1" });
    expect(lastFrameOf(stale)).toEqual({
      type: "ActionRejected",
      reason: "PlayerNotInRoom",
      message: "Join a room first",
      intent: "LeaveRoom",
    });
    const room = await server.roomGateway.loadRoomState("ROOM1");
    expect(room.players[1]).toMatchObject({ evicted: false, connected: true, connectionId: "c3" });
    expect(server.sessions.membership("c3")).toMatchObject({ roomCode: "ROOM1", playerId: "p2" });
  });

  it("refuses a resume as someone else in the room the socket already sits in", async () => {
    const server = createServerTestContext();
    const ann = await server.connect("c1");
    await server.connect("c2");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    await server.say("c2", { type: "JoinRoom", code: "ROOM1", displayName: "Ben" });
    const token = server.sessions.membership("c2")?.resumeToken ?? "";

    await server.say("c1", {
      type: "RejoinRoom",
      code: "ROOM1",
      playerId: "p2",
      resumeToken: token,
    });

    expect(lastFrameOf(ann)).toEqual({
      type: "ActionRejected",
      reason: "InvalidInput",
      message: "Already seated in room ROOM1 as p1",
      intent: "RejoinRoom",
    });
    expect(server.sessions.membership("c1")).toMatchObject({ playerId: "p1" });
    expect(server.sessions.membership("c2")).toMatchObject({ playerId: "p2" });
  });
});
