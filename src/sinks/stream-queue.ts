/**
 * Per-key serial task queue.
 *
 * Tasks sharing a key run one after another in enqueue order; tasks of
 * different keys run concurrently. A failed task does not stop the ones
 * queued behind it.
 */
export class StreamQueue {
  private readonly tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(settled, settled);

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return run;
  }

  /** Number of keys with queued or running tasks */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** Resolves once every task enqueued so far has settled */
  async drain(): Promise<void> {
    await Promise.all(this.tails.values());
  }
}

function settled(): void {}
