// Serial execution lane
//
// Runs async tasks one at a time in submission order. Used as the single
// writer path for the entity registry and as the host's owner thread.

const noop = () => {};

/**
 * A FIFO of async tasks where each task starts only after the previous
 * one has settled. A rejected task does not block later ones.
 */
export class SerialLane {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /**
   * Schedule a task. Resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.queued++;

    const execute = async (): Promise<T> => {
      try {
        return await task();
      } finally {
        this.queued--;
      }
    };

    const result = this.tail.then(execute);
    this.tail = result.then(noop, noop);
    return result;
  }

  /**
   * Number of tasks scheduled but not yet settled, including the running one.
   */
  get size(): number {
    return this.queued;
  }

  /**
   * Resolves once every task scheduled so far has settled.
   */
  whenIdle(): Promise<void> {
    return this.tail;
  }
}
