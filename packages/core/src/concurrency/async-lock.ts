/**
 * Exclusive async lock built on a promise chain.
 *
 * Callers run one at a time in arrival order. A task that throws releases the
 * lock and its error reaches only its own caller.
 *
 * @example
 * ```typescript
 * const lock = new AsyncLock();
 * await lock.run(() => backend.transaction((tx) => tx.putEntity(entity)));
 * ```
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every earlier task has settled
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /** Whether a task is running or waiting */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  /** Tasks running or waiting */
  get queueLength(): number {
    return this.pending;
  }

  private release(): void {
    this.pending--;
  }
}
