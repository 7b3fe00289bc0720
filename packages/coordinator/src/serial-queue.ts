/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller receives the outcome; the chain only needs to know it settled.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
