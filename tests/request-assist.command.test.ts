import { describe, expect, it, vi } from "vitest";

import { createRoomHarness, seatPlayers, type RoomHarness } from "./support/harness.js";
import { createResponseGeneratorMock, type ResponseGeneratorMock } from "./support/mocks.js";
import { RejoinRoom } from "../src/domain/commands/RejoinRoom.js";
import { RequestAssist } from "../src/domain/commands/RequestAssist.js";
import { StartGame } from "../src/domain/commands/StartGame.js";
import { SubmitResponse } from "../src/domain/commands/SubmitResponse.js";
import type { GameConfigOverrides } from "../src/domain/GameConfig.js";
import type { RoomCode } from "../src/domain/typedefs.js";

interface AssistSetup {
  readonly harness: RoomHarness;
  readonly code: RoomCode;
  readonly resumeToken: string;
}

async function challengeRoom(
  responseGenerator?: ResponseGeneratorMock,
  config?: GameConfigOverrides,
): Promise<AssistSetup> {
  const harness = createRoomHarness({
    ...(responseGenerator ? { responseGenerator } : {}),
    ...(config ? { config } : {}),
  });
  const { code, players } = await seatPlayers(harness, ["Ann", "Ben"]);
  await harness.run(new StartGame(code, "p1", 0));
  return { harness, code, resumeToken: players[0]?.resumeToken ?? "" };
}

describe("RequestAssist command", () => {
  it("sends the drafted text to the requester only", async () => {
    const responseGenerator = createResponseGeneratorMock();
    responseGenerator.generate.mockResolvedValue("  The Crunch Crusader  ");
    const { harness, code } = await challengeRoom(responseGenerator);
    const before = await harness.roomGateway.loadRoomState(code);

    await harness.run(new RequestAssist(code, "p1", " something crunchy ", 1_000));

    expect(responseGenerator.generate).toHaveBeenCalledWith(
      {
        challenge: "Name a sandwich for a superhero.",
        idea: "something crunchy",
        displayName: "Ann",
      },
      expect.any(AbortSignal),
    );
    expect(harness.bus.received("c1").at(-1)).toEqual({
      type: "AssistReady",
      roundNumber: 1,
      text: "The Crunch Crusader",
    });
    expect(harness.bus.received("c2").at(-1)?.type).not.toBe("AssistReady");
    await expect(harness.roomGateway.loadRoomState(code)).resolves.toEqual(before);
  });

  it("cuts a draft down to the response length limit", async () => {
    const responseGenerator = createResponseGeneratorMock();
    responseGenerator.generate.mockResolvedValue("abcdefghijklmno");
    const { harness, code } = await challengeRoom(responseGenerator, { maxResponseLength: 10 });

    await harness.run(new RequestAssist(code, "p1", "letters", 0));

    expect(harness.bus.received("c1").at(-1)).toEqual({
      type: "AssistReady",
      roundNumber: 1,
      text: "abcdefghij",
    });
  });

  it("says so when assistance is not configured", async () => {
    const { harness, code } = await challengeRoom();

    await harness.run(new RequestAssist(code, "p1", "anything", 0));

    expect(harness.bus.received("c1").at(-1)).toEqual({
      type: "AssistUnavailable",
      reason: "Assistance is not configured",
    });
  });

  it("tells the player to type their own when generation fails", async () => {
    const responseGenerator = createResponseGeneratorMock();
    responseGenerator.generate.mockRejectedValue(new Error("quota exceeded"));
    const { harness, code } = await challengeRoom(responseGenerator);

    await harness.run(new RequestAssist(code, "p1", "anything", 0));

    expect(harness.bus.received("c1").at(-1)).toEqual({
      type: "AssistUnavailable",
      reason: "Assistance failed; type your own",
    });
  });

  it("drops a draft that arrives after the player already responded", async () => {
    let finish: (text: string) => void = () => undefined;
    const responseGenerator = createResponseGeneratorMock();
    responseGenerator.generate.mockReturnValue(
      new Promise<string>((resolve) => {
        finish = resolve;
      }),
    );
    const { harness, code } = await challengeRoom(responseGenerator);

    const assist = harness.run(new RequestAssist(code, "p1", "anything", 0));
    await vi.waitFor(() => expect(responseGenerator.generate).toHaveBeenCalled());
    await harness.run(new SubmitResponse(code, "p1", "Typed it myself", 0));
    finish("Too late");
    await assist;

    expect(harness.bus.received("c1").at(-1)).toEqual({
      type: "AssistUnavailable",
      reason: "The round moved on",
    });
  });

  it("replies on the connection the player resumed on", async () => {
    let finish: (text: string) => void = () => undefined;
    const responseGenerator = createResponseGeneratorMock();
    responseGenerator.generate.mockReturnValue(
      new Promise<string>((resolve) => {
        finish = resolve;
      }),
    );
    const { harness, code, resumeToken } = await challengeRoom(responseGenerator);

    const assist = harness.run(new RequestAssist(code, "p1", "anything", 0));
    await vi.waitFor(() => expect(responseGenerator.generate).toHaveBeenCalled());
    await harness.run(new RejoinRoom(code, "p1", resumeToken, "c9", 0));
    finish("Sub Zero");
    await assist;

    expect(harness.bus.received("c9").at(-1)).toEqual({
      type: "AssistReady",
      roundNumber: 1,
      text: "Sub Zero",
    });
    expect(harness.bus.received("c1").at(-1)).toEqual({ type: "LeftRoom", code });
  });

  it("rejects an empty idea", async () => {
    const { harness, code } = await challengeRoom(createResponseGeneratorMock());

    await expect(harness.run(new RequestAssist(code, "p1", "   ", 0))).rejects.toMatchObject({
      reason: "InvalidInput",
    });
  });

  it("is only available while responses are being collected", async () => {
    const responseGenerator = createResponseGeneratorMock();
    const harness = createRoomHarness({ responseGenerator });
    const { code } = await seatPlayers(harness, ["Ann", "Ben"]);

    await expect(harness.run(new RequestAssist(code, "p1", "anything", 0))).rejects.toMatchObject({
      reason: "InvalidPhaseForAction",
    });
    expect(responseGenerator.generate).not.toHaveBeenCalled();
  });

  it("is refused once the player has responded", async () => {
    const responseGenerator = createResponseGeneratorMock();
    const { harness, code } = await challengeRoom(responseGenerator);
    await harness.run(new SubmitResponse(code, "p1", "Done already", 0));

    await expect(harness.run(new RequestAssist(code, "p1", "anything", 0))).rejects.toMatchObject({
      reason: "DuplicateSubmission",
    });
  });
});
