/**
 * Runs async tasks one at a time, in submission order.
 *
 * A rejected task only rejects its own caller; the chain carries on with the
 * next task.
 */
export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  public get pending(): number {
    return this.pendingCount;
  }

  public run<T>(task: () => Promise<T>): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public drain(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pendingCount -= 1;
  }
}
