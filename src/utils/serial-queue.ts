/**
 * Runs async tasks strictly one after another, in submission order.
 * A rejected task is reported to its own caller and does not stall the queue.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
