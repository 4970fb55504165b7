/**
 * Runs async work one task at a time, in submission order.
 * A failed task does not stop the tasks queued after it.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();

  enqueue<T>(work: () => Promise<T>): Promise<T> {
    const next = this.tail.then(work, work);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  /** Resolves once every task queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
