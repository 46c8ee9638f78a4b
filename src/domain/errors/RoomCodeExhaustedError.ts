export class RoomCodeExhaustedError extends Error {
  constructor(public readonly attempts: number) {
    super(`Could not allocate a unique room code after ${attempts} attempts`);
    this.name = "RoomCodeExhaustedError";
  }
}
