/**
 * Runs tasks one at a time in submission order. A failed task does not
 * block the ones queued after it; its rejection goes to its own caller.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    // the chain only tracks completion; `next` carries the outcome
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
