/**
 * Serial executor
 *
 * Runs asynchronous tasks one at a time, in submission order. A task starts
 * only after the previous one has settled, whether it resolved or rejected.
 */

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /**
   * Queue a task; the returned promise settles with the task's outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Number of tasks running or waiting to run
   */
  get pending(): number {
    return this.queued;
  }

  /**
   * Resolves once every task queued so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.queued--;
  }
}
