import { describe, expect, it, vi } from "vitest";

import { createServerTestContext, type ServerTestContext } from "./support/testContext.js";
import { createServerApp } from "../../packages/server/src/app.js";
import type { DispatchCommand } from "../../packages/server/src/SessionGateway.js";
import { dispatchCommand } from "../../src/domain/commands/dispatchCommand.js";

function createApp(
  server: ServerTestContext,
  dispatch: DispatchCommand = dispatchCommand,
) {
  return createServerApp({
    port: 4321,
    roomGateway: server.roomGateway,
    logger: server.logger,
    createContext: server.createContext,
    dispatch,
    aiEnabled: false,
  });
}

describe("HTTP routes", () => {
  it("reports health status", async () => {
    const app = createApp(createServerTestContext());

    const response = await app.request("/api/health");

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    const body: unknown = await response.json();
    expect(body).toEqual({
      ok: true,
      timestamp: expect.any(Number),
      config: { port: 4321, aiEnabled: false },
    });
  });

  it("answers CORS preflight requests", async () => {
    const app = createApp(createServerTestContext());

    const response = await app.request("/api/rooms", { method: "OPTIONS" });

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-methods")).toBe("GET,OPTIONS");
  });

  it("lists joinable rooms", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    const app = createApp(server);

    const response = await app.request("/api/rooms");

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toEqual({
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

  it("reports a failure to list rooms as a server error", async () => {
    const server = createServerTestContext();
    const app = createApp(server, vi.fn().mockRejectedValue(new Error("directory offline")));

    const response = await app.request("/api/rooms");

    expect(response.status).toBe(500);
    const body: unknown = await response.json();
    expect(body).toEqual({ error: "directory offline" });
    expect(server.logger.error).toHaveBeenCalledWith("Failed to list rooms", {
      error: new Error("directory offline"),
    });
  });

  it("serves a room snapshot by code in any case", async () => {
    const server = createServerTestContext();
    await server.connect("c1");
    await server.say("c1", { type: "CreateRoom", displayName: "Ann" });
    const app = createApp(server);

    const response = await app.request("/api/rooms/room1");

    expect(response.status).toBe(200);
    const snapshot: unknown = await response.json();
    expect(snapshot).toMatchObject({
      type: "RoomSnapshot",
      code: "ROOM1",
      revision: 1,
      phase: "lobby",
      players: [{ id: "p1", displayName: "Ann", connected: true, score: 0 }],
    });
  });

  it("returns 404 for an unknown room", async () => {
    const app = createApp(createServerTestContext());

    const response = await app.request("/api/rooms/NOPE1");

    expect(response.status).toBe(404);
    const body: unknown = await response.json();
    expect(body).toEqual({ error: "Room not found" });
  });
});
