/**
 * Promise-chained mutex.
 *
 * Guards the recording state and the interaction mode, where the critical
 * section stays synchronous or short. The profile store also keeps one per
 * file so read-modify-write cycles do not interleave.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run fn once every earlier caller has released the lock.
   *
   * @param fn - The critical section
   * @returns fn's result
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
