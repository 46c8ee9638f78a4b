import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  ListRooms,
  toSnapshot,
  type CommandContext,
  type Logger,
  type RoomGateway,
} from "./core.js";
import type { DispatchCommand } from "./SessionGateway.js";

export interface CreateServerAppOptions {
  readonly port: number;
  readonly roomGateway: RoomGateway;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  /** Whether AI challenges and assistance are enabled */
  readonly aiEnabled: boolean;
}

export function createServerApp({
  port,
  roomGateway,
  logger,
  createContext,
  dispatch,
  aiEnabled,
}: CreateServerAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port, aiEnabled } }),
  );

  app.get("/api/rooms", async (c: Context) => {
    try {
      const rooms = await dispatch(new ListRooms(Date.now()), createContext());
      return c.json({ rooms });
    } catch (error) {
      logger.error("Failed to list rooms", { error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  app.get("/api/rooms/:code", async (c) => {
    const code = c.req.param("code");
    const state = await roomGateway.findRoomState(code);
    if (!state) {
      return c.json({ error: "Room not found" }, 404);
    }
    return c.json(toSnapshot(state));
  });

  return app;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
