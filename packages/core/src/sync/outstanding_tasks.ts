/**
 * OutstandingTasks - Cycle Completion Counter
 *
 * Counts tasks that have been handed to the queue but not yet finished.
 * The orchestrator adds before a task becomes visible to workers; the worker
 * that finishes it calls `done()` exactly once. `wait()` resolves when the
 * count is back to zero.
 *
 * @module sync/outstanding_tasks
 */

export class OutstandingTasks {
  private count: number = 0;
  private waiters: Array<() => void> = [];

  get pending(): number {
    return this.count;
  }

  add(delta: number = 1): void {
    if (!Number.isInteger(delta) || delta < 1) {
      throw new RangeError(`OutstandingTasks.add expects a positive integer, got ${delta}`);
    }
    this.count += delta;
  }

  /**
   * @throws Error if called more often than `add`
   */
  done(): void {
    if (this.count === 0) {
      throw new Error("OutstandingTasks counter would go negative");
    }
    this.count -= 1;
    if (this.count === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  wait(): Promise<void> {
    if (this.count === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
