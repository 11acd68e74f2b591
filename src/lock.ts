/**
 * Asynchronous mutual exclusion: tasks run one at a time, in call order.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // keep the chain alive whatever the task did
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
