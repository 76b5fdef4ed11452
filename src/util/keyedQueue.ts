// src/util/keyedQueue.ts

/**
 * Runs tasks one at a time per key. Tasks on different keys run
 * concurrently. A failing task does not block the ones queued behind it.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();

    const result = prev.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    // last one out cleans up the key
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  get pending(): number {
    return this.tails.size;
  }
}
