/**
 * Per-key mutual exclusion built on promise chains
 */

export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run task once every earlier task for the same key has settled
   */
  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
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
}
