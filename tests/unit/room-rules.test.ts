import { describe, expect, it } from "vitest";

import {
  allConnectedResponded,
  allEligibleVoted,
  assertValidRoomState,
  buildBallot,
  eligibleVoters,
  toSnapshot,
  toSummary,
} from "../../src/domain/entities/RoomRules.js";
import { InvalidRoomStateError } from "../../src/domain/errors/InvalidRoomStateError.js";
import { thrownBy } from "../support/errors.js";
import {
  createChallengeRoom,
  createPlayer,
  createRoomState,
  createVotingRoom,
} from "../support/rooms.js";

describe("RoomRules", () => {
  describe("participation", () => {
    it("requires every connected player to have a non-empty response", () => {
      const room = createChallengeRoom({
        players: [createPlayer("p1"), createPlayer("p2"), createPlayer("p3", { connected: false })],
        responses: {
          p1: { text: "one", submittedAt: 1, order: 0 },
        },
      });

      expect(allConnectedResponded(room)).toBe(false);

      room.responses["p2"] = { text: "two", submittedAt: 2, order: 1 };
      expect(allConnectedResponded(room)).toBe(true);
    });

    it("treats a room with nobody connected as not complete", () => {
      const room = createChallengeRoom({
        players: [createPlayer("p1", { connected: false })],
      });

      expect(allConnectedResponded(room)).toBe(false);
    });

    it("counts only connected players with someone else's response to vote for", () => {
      const room = createVotingRoom({
        responses: {
          p1: { text: "only me", submittedAt: 1, order: 0 },
          p2: { text: "", submittedAt: 45_000, order: 1 },
          p3: { text: "", submittedAt: 45_000, order: 2 },
        },
      });

      expect(eligibleVoters(room).map((player) => player.id)).toEqual(["p2", "p3"]);
    });

    it("knows when every eligible voter has voted", () => {
      const room = createVotingRoom({ votes: { p1: "p2", p2: "p1" } });
      expect(allEligibleVoted(room)).toBe(false);

      room.votes["p3"] = "p1";
      expect(allEligibleVoted(room)).toBe(true);
    });
  });

  describe("snapshots", () => {
    it("lists non-empty responses in submission order on the ballot", () => {
      const room = createVotingRoom();

      expect(buildBallot(room)).toEqual([
        { playerId: "p1", displayName: "P1", text: "He reads." },
        { playerId: "p2", displayName: "P2", text: "He naps." },
      ]);
    });

    it("hides evicted players and secrets from the snapshot", () => {
      const room = createRoomState({
        revision: 7,
        players: [createPlayer("p1", { score: 3 }), createPlayer("p2", { evicted: true, connected: false })],
      });

      const snapshot = toSnapshot(room);

      expect(snapshot).toEqual({
        type: "RoomSnapshot",
        code: "ABCDE",
        name: "Test Room",
        revision: 7,
        phase: "lobby",
        roundNumber: 0,
        players: [
          {
            id: "p1",
            displayName: "P1",
            connected: true,
            score: 3,
            responded: false,
            voted: false,
          },
        ],
        responsesSubmittedCount: 0,
        votesCastCount: 0,
      });
      expect(JSON.stringify(snapshot)).not.toContain("token-p1");
    });

    it("includes the challenge, deadline and ballot while voting", () => {
      const snapshot = toSnapshot(createVotingRoom({ votes: { p3: "p1" } }));

      expect(snapshot.challenge).toEqual({
        text: "Describe a dragon's day off.",
        category: "Fiction",
        roundNumber: 1,
      });
      expect(snapshot.deadline).toBe(65_000);
      expect(snapshot.responsesSubmittedCount).toBe(2);
      expect(snapshot.votesCastCount).toBe(1);
      expect(snapshot.ballot).toHaveLength(2);
      expect(snapshot.results).toBeUndefined();
      expect(snapshot.players.map((player) => [player.id, player.responded, player.voted])).toEqual([
        ["p1", true, false],
        ["p2", true, false],
        ["p3", false, true],
      ]);
    });

    it("summarises a room for listings", () => {
      const room = createRoomState({
        players: [
          createPlayer("p1"),
          createPlayer("p2", { connected: false }),
          createPlayer("p3", { evicted: true, connected: false }),
        ],
      });

      expect(toSummary(room)).toEqual({
        code: "ABCDE",
        name: "Test Room",
        phase: "lobby",
        playerCount: 2,
        connectedCount: 1,
        createdAt: 0,
      });
    });
  });

  describe("assertValidRoomState", () => {
    it("accepts well-formed rooms in every phase", () => {
      expect(() => assertValidRoomState(createRoomState())).not.toThrow();
      expect(() => assertValidRoomState(createChallengeRoom())).not.toThrow();
      expect(() => assertValidRoomState(createVotingRoom({ votes: { p3: "p1" } }))).not.toThrow();
    });

    it("rejects a self vote", () => {
      const error = thrownBy(() => assertValidRoomState(createVotingRoom({ votes: { p1: "p1" } })));

      expect(error).toBeInstanceOf(InvalidRoomStateError);
      expect(error).toMatchObject({ reason: "self vote recorded for p1" });
    });

    it("rejects a vote for a placeholder response", () => {
      expect(
        thrownBy(() => assertValidRoomState(createVotingRoom({ votes: { p1: "p3" } }))),
      ).toMatchObject({ reason: "vote from p1 targets a missing response" });
    });

    it("rejects responses from players outside the room", () => {
      const room = createChallengeRoom({
        responses: { stranger: { text: "hi", submittedAt: 1, order: 0 } },
      });

      expect(thrownBy(() => assertValidRoomState(room))).toMatchObject({
        reason: "response from unknown player stranger",
      });
    });

    it("requires a deadline while a timed phase runs", () => {
      expect(
        thrownBy(() => assertValidRoomState(createChallengeRoom({ phaseDeadline: undefined }))),
      ).toMatchObject({ reason: "missing phase deadline" });
    });

    it("requires the challenge to belong to the current round", () => {
      expect(thrownBy(() => assertValidRoomState(createChallengeRoom({ roundNumber: 2 })))).toMatchObject(
        { reason: "challenge belongs to another round" },
      );
    });

    it("rejects negative or fractional scores", () => {
      const room = createRoomState({ players: [createPlayer("p1", { score: -1 })] });

      expect(thrownBy(() => assertValidRoomState(room))).toMatchObject({
        reason: "invalid score for p1",
      });
    });
  });
});
