/**
 * Runs async tasks one after another. Node interleaves request handlers at
 * every await, so state shared across requests goes through one of these.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task);
    // The tail only orders tasks; the caller still receives the rejection.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
