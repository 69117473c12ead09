/**
 * Per-key mutual exclusion for index writes. Readers wait for a pending write
 * on the same key so they never see a half-written index.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
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

  async whenIdle(key: string): Promise<void> {
    await this.tails.get(key);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export const indexLock = new KeyedLock();
