/**
 * Purpose: In-process mutual exclusion keyed by an arbitrary string.
 * Context: The marathon service wraps each load → mutate → store sequence in
 * `run(dataDir, ...)` so two commands handled by this process cannot interleave
 * their writes to the same data directory.
 * Invariants:
 * - Tasks for the same key run one at a time, in submission order.
 * - A rejected task releases the key; the rejection reaches its own caller only.
 * Gotchas:
 * - Nothing is shared across processes. Two bots pointed at one directory still race.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
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

  /** Number of keys with a queued or running task. */
  get size(): number {
    return this.tails.size;
  }
}
