/**
 * Serializes async tasks that share a key (a session id) while letting tasks for
 * different keys run freely. Tasks for one key run in arrival order; a failing
 * task does not block the ones queued behind it.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // The queue only tracks completion; the outcome is delivered through `current`.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  // Number of keys with queued or running work.
  get size(): number {
    return this.tails.size;
  }
}
