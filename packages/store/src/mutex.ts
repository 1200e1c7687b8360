/**
 * A promise-based mutex keyed by string.
 *
 * Work submitted under the same key runs one task at a time in submission
 * order; work under different keys runs independently. The marketplace
 * locks per category, the ledger per subject, acceptances per trade and
 * registration per soul id.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.run('translation', async () => matchAndPersist());
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier task for `key` has settled. A task that
   * throws releases the lock; its error is returned to its own caller only.
   */
  async run<R>(key: string, fn: () => Promise<R> | R): Promise<R> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const tail = new Promise<void>((r) => {
      release = r;
    });
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** `true` while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with running or queued work. */
  get size(): number {
    return this.tails.size;
  }
}
