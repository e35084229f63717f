/**
 * Per-key async mutex.
 *
 * Serializes work on the same final artifact name within this process so a
 * second concurrent upload finds the first one's artifact instead of
 * compressing and renaming the same bytes again. Distinct keys never wait on
 * each other.
 */
export class NameLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with work queued or running */
  get size(): number {
    return this.tails.size;
  }
}
