/**
 * Runs tasks one at a time in the order they were submitted. A failing task
 * rejects its own promise and does not stop the ones queued behind it.
 */
export class CommandQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  // resolves once everything submitted so far has run
  drain(): Promise<void> {
    return this.tail;
  }
}
