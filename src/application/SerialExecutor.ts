/**
 * Runs async tasks one after another, in submission order.
 * A rejected task rejects its own promise only; the chain keeps going.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const next = this.tail.then(task, task).finally(() => {
      this.pending--;
    });
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every task submitted so far has settled */
  async idle(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }
}
