/**
 * Serializes async work per key. Tasks sharing a key run one after another in
 * submission order; tasks on different keys do not wait on each other.
 */
export interface KeyedLock {
  run<T>(key: string, task: () => Promise<T> | T): Promise<T>;
  isLocked(key: string): boolean;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);
      const tail = result.then(
        () => undefined,
        () => undefined,
      );
      tails.set(key, tail);
      void tail.then(() => {
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      });
      return result;
    },
    isLocked(key: string): boolean {
      return tails.has(key);
    },
  };
}
