/**
 * Single-consumer queue: tasks run one at a time in enqueue order
 */

export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of tasks waiting or running
   */
  get size(): number {
    return this.pending;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    // A failed task must not stall the ones behind it
    this.tail = run.then(
      () => undefined,
      () => undefined
    ).finally(() => {
      this.pending--;
    });
    return run;
  }

  /**
   * Resolves once every task enqueued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
