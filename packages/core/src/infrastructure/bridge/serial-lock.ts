/**
 * @file packages/core/src/infrastructure/bridge/serial-lock.ts
 * @description Promise-chained mutual exclusion.
 */

/**
 * Runs async tasks one at a time, in call order.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not wedge the tasks queued behind it.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
