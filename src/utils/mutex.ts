/**
 * Serializes async critical sections. Tasks run one at a time in the order
 * they were queued; a failing task releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
