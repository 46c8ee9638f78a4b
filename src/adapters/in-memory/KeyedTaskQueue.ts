/* eslint-disable functional/immutable-data */
import type { RoomLocks } from "../../domain/ports/RoomLocks.js";

/**
 * Promise-chain serializer: one tail per key. A task starts only after every
 * task queued earlier under the same key has settled.
 */
export class KeyedTaskQueue implements RoomLocks {
  #tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail only orders later tasks; the outcome reaches the caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.#tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.#tails.size;
  }
}
