/**
 * async-helpers.ts
 * Async utility helpers for delays and serialized execution
 */

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Promise-chain mutex. Tasks passed to runExclusive run one at a time in call
 * order; a failing task does not block the ones queued after it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Lazily created mutex per key.
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    return lock.runExclusive(task);
  }
}
