/**
 * Runs tasks one at a time in submission order. A failed task does not
 * stop the ones queued behind it; its rejection goes to its own caller.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }
}

/** One SerialQueue per key; idle queues are dropped. */
export class KeyedSerialQueue {
  private readonly queues = new Map<string, SerialQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(key, queue);
    }
    try {
      return await queue.run(task);
    } finally {
      if (queue.size === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }
}
