const noop = (): void => {};

/**
 * Runs tasks one at a time in submission order. Used as the execution context
 * for objects that must never be touched concurrently.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(public readonly name: string) {}

  /** Number of tasks submitted but not yet settled. */
  public get pending(): number {
    return this.queued;
  }

  /**
   * Schedules `task` after every previously submitted task has settled. The
   * returned promise carries the task's result or failure; a failure never
   * stalls the queue.
   */
  public run<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued += 1;
    const result = this.tail.then(task).finally(() => {
      this.queued -= 1;
    });
    this.tail = result.then(noop, noop);
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public idle(): Promise<void> {
    return this.tail;
  }
}
