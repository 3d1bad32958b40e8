/**
 * KeyedLock: serializes async critical sections per key.
 *
 * Work for the same key runs strictly one at a time, in call order.
 * Work for different keys runs without coordination.
 */

export interface KeyedLock {
  /** Run `work` once every earlier section for `key` has settled. */
  run<T>(key: string, work: () => Promise<T> | T): Promise<T>;
  /** Number of keys with a section queued or running. */
  readonly activeKeys: number;
}

/** Create a per-key mutex. */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async run<T>(key: string, work: () => Promise<T> | T): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await work();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    get activeKeys(): number {
      return tails.size;
    },
  };
}
