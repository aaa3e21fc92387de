/**
 * Minimal FIFO async mutex.
 *
 * Callers queue in the order they call {@link Mutex.runExclusive}; each task
 * starts only after the previous one has settled, whether it resolved or not.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Run `task` once every earlier task has settled. */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.pending++;

    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /** Whether a task is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}
