/* eslint-disable functional/immutable-data */
import { assertValidRoomState, toSummary } from "../../domain/entities/RoomRules.js";
import { RoomCodeExhaustedError } from "../../domain/errors/RoomCodeExhaustedError.js";
import { RoomNotFoundError } from "../../domain/errors/RoomNotFoundError.js";
import type {
  RoomGateway,
  RoomState,
  RoomSummary,
} from "../../domain/ports/RoomGateway.js";
import type { RoomCode, TimePoint } from "../../domain/typedefs.js";

/** No 0/O or 1/I so codes survive being read aloud */
const CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
const CODE_LENGTH = 5;
const MAX_CODE_ATTEMPTS = 32;

export type RoomCodeGenerator = () => RoomCode;

export function randomRoomCode(): RoomCode {
  const buffer = new Uint32Array(CODE_LENGTH);
  globalThis.crypto.getRandomValues(buffer);
  return Array.from(buffer, (value) => CODE_ALPHABET[value % CODE_ALPHABET.length]).join("");
}

/**
 * Process-wide room directory. Every method runs to completion on the event
 * loop without yielding between the map lookup and the map update, so
 * concurrent create/load/remove calls from different connections cannot
 * interleave inside one operation.
 */
export class InMemoryRoomGateway implements RoomGateway {
  #rooms = new Map<RoomCode, RoomState>();
  readonly #generateCode: RoomCodeGenerator;

  constructor(generateCode: RoomCodeGenerator = randomRoomCode) {
    this.#generateCode = generateCode;
  }

  async createRoom(at: TimePoint, name: string): Promise<RoomState> {
    for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt += 1) {
      const code = this.#generateCode().toUpperCase();
      if (this.#rooms.has(code)) continue;

      const state: RoomState = {
        code,
        name,
        createdAt: at,
        phase: "lobby",
        players: [],
        challenge: undefined,
        responses: {},
        votes: {},
        results: undefined,
        roundNumber: 0,
        pendingRound: undefined,
        phaseStartedAt: at,
        phaseDeadline: undefined,
        revision: 0,
      };

      assertValidRoomState(state);
      this.#rooms.set(code, this.#clone(state));
      return this.#clone(state);
    }

    throw new RoomCodeExhaustedError(MAX_CODE_ATTEMPTS);
  }

  async loadRoomState(code: RoomCode): Promise<RoomState> {
    const state = this.#rooms.get(code.toUpperCase());
    if (!state) throw new RoomNotFoundError(code);
    return this.#clone(state);
  }

  async findRoomState(code: RoomCode): Promise<RoomState | undefined> {
    const state = this.#rooms.get(code.toUpperCase());
    return state ? this.#clone(state) : undefined;
  }

  async saveRoomState(state: RoomState): Promise<void> {
    if (!this.#rooms.has(state.code)) throw new RoomNotFoundError(state.code);
    assertValidRoomState(state);
    this.#rooms.set(state.code, this.#clone(state));
  }

  async removeRoom(code: RoomCode): Promise<void> {
    this.#rooms.delete(code.toUpperCase());
  }

  async listRooms(): Promise<readonly RoomSummary[]> {
    return [...this.#rooms.values()].map((state) => toSummary(state));
  }

  #clone(state: RoomState): RoomState {
    return structuredClone(state);
  }
}
