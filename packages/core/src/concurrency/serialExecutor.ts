/**
 * Single-concurrency execution context.
 *
 * Tasks run one at a time in submission order; a rejected task does not
 * stop the ones queued behind it.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      }
    );
    return result;
  }

  /** Number of submitted tasks that have not settled yet */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }
}
