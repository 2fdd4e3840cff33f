/**
 * Promise-chain mailbox: tasks run one at a time in submission order.
 * A rejected task rejects its own promise only.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  get size() {
    return this.pending;
  }

  /** Resolves once everything submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle() {
    this.pending -= 1;
  }
}
