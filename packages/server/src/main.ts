import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import { randomUUID } from "node:crypto";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { OpenAIChallengeGenerator } from "./adapters/OpenAIChallengeGenerator.js";
import { OpenAIChatClient } from "./adapters/OpenAIChatClient.js";
import { OpenAIResponseGenerator } from "./adapters/OpenAIResponseGenerator.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createServerApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import {
  InMemoryRoomGateway,
  KeyedTaskQueue,
  StaticChallengeGenerator,
  dispatchCommand,
  type ChallengeGenerator,
  type CommandContext,
  type Logger,
  type ResponseGenerator,
} from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { SessionGateway } from "./SessionGateway.js";

interface Generators {
  readonly challengeGenerator: ChallengeGenerator;
  readonly responseGenerator?: ResponseGenerator;
}

export async function startServer(config: ServerConfig = loadServerConfig()): Promise<void> {
  const logger = createConsoleLogger("promptfall");
  const roomGateway = new InMemoryRoomGateway();
  const locks = new KeyedTaskQueue();
  const bus = new WebSocketBus(logger);
  const fallbackChallenges = new StaticChallengeGenerator();
  const generators = createGenerators(config, fallbackChallenges, logger);

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    roomGateway,
    bus,
    scheduler,
    locks,
    challengeGenerator: generators.challengeGenerator,
    fallbackChallenges,
    ...(generators.responseGenerator ? { responseGenerator: generators.responseGenerator } : {}),
    config: config.game,
    logger,
    now: Date.now,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const sessions = new SessionGateway({ bus, createContext, logger });

  const app = createServerApp({
    port: config.port,
    roomGateway,
    logger,
    createContext,
    dispatch: dispatchCommand,
    aiEnabled: config.openAiApiKey !== undefined,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => {
      const connectionId = randomUUID();
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { connectionId });
            ws.close(1011, "Unsupported socket");
            return;
          }
          bus.attach(connectionId, rawSocket);
          void sessions.open(connectionId).catch((error: unknown) => {
            logger.error("Failed to open session", { connectionId, error });
          });
        },
        onMessage(event: MessageEvent): void {
          const raw = typeof event.data === "string" ? event.data : String(event.data);
          void sessions.receive(connectionId, raw).catch((error: unknown) => {
            logger.error("Failed to process message", { connectionId, error });
          });
        },
        onClose(): void {
          void sessions
            .close(connectionId)
            .catch((error: unknown) => {
              logger.error("Failed to close session", { connectionId, error });
            })
            .finally(() => bus.detach(connectionId));
        },
        onError(error: Event): void {
          logger.warn("WebSocket client error", { connectionId, error: error.type });
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", {
      ...info,
      ai: config.openAiApiKey ? config.openAiModel : "disabled",
    });
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down");
    scheduler.dispose();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function createGenerators(
  config: ServerConfig,
  fallbackChallenges: ChallengeGenerator,
  logger: Logger,
): Generators {
  if (!config.openAiApiKey) {
    logger.warn("OPENAI_API_KEY is not set. Using the static challenge pool without assistance.");
    return { challengeGenerator: fallbackChallenges };
  }

  const client = new OpenAIChatClient({
    apiKey: config.openAiApiKey,
    model: config.openAiModel,
    logger,
  });

  return {
    challengeGenerator: new OpenAIChallengeGenerator(client),
    responseGenerator: new OpenAIResponseGenerator(client),
  };
}

void startServer().catch((error: unknown) => {
  createConsoleLogger("promptfall").error("Failed to start server", { error });
  process.exit(1);
});
