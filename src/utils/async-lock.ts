/**
 * Async Lock - In-process mutual exclusion for shared mutable state
 *
 * Callers queue in arrival order. A failed holder releases the lock.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Run `operation` once every earlier holder has settled
   */
  runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    this.waiting++;

    const run = this.tail.then(() => operation());
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.tail = settled.then(() => {
      this.waiting--;
    });

    return run;
  }

  /**
   * True while any operation holds or awaits the lock
   */
  isLocked(): boolean {
    return this.waiting > 0;
  }
}
