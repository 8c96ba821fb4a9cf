/**
 * Promise-chain mutex. Callbacks passed to `run` execute one at a time in
 * call order; a rejected callback releases the lock like a resolved one.
 *
 * Not reentrant: calling `run` on the same lock from inside a callback
 * deadlocks.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => fn());
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /** Number of callbacks queued or running. */
  get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending -= 1;
  }
}
