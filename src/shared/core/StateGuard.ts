/**
 * StateGuard - the single exclusive lock over Arena + Roster
 *
 * Tasks run one at a time in acquisition order. A task may await (sending
 * a broadcast, for example) and still no other task starts until it settles.
 * The lock is released on every exit path, including a rejected task.
 */
export class StateGuard {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiting = 0;

  /**
   * Whether a task is running under the guard right now
   */
  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Number of tasks queued behind the current holder
   */
  get pending(): number {
    return this.waiting;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.waiting++;

    const run = this.tail.then(async () => {
      this.waiting--;
      this.held = true;
      try {
        return await task();
      } finally {
        this.held = false;
      }
    });

    // The next task waits for this one whether it resolves or rejects
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }
}
