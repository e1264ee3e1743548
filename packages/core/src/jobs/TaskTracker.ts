/**
 * TaskTracker - join group for concurrently running job loops
 *
 * Counts tracked tasks until they settle. Once closed it admits nothing
 * new, and wait() resolves when it is closed and empty.
 *
 * @module jobs/TaskTracker
 */

import { deferred, type Deferred } from '../utils/async.js';

export class TaskTracker {
  private outstanding = 0;
  private closed = false;
  private waiters: Deferred<void>[] = [];

  /**
   * Start a task and track it until its promise settles.
   * A task that throws or rejects still counts as settled.
   *
   * @returns false (and the task is never started) if the tracker is closed
   */
  track(task: () => Promise<unknown>): boolean {
    if (this.closed) {
      return false;
    }

    this.outstanding++;
    let pending: Promise<unknown>;
    try {
      pending = task();
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      () => this.settle(),
      () => this.settle()
    );
    return true;
  }

  /**
   * Stop admitting new tasks. Idempotent.
   */
  close(): void {
    this.closed = true;
    this.notifyIfDrained();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of tasks that have not yet settled
   */
  get size(): number {
    return this.outstanding;
  }

  /**
   * Resolves once the tracker is closed and every tracked task has settled
   */
  wait(): Promise<void> {
    if (this.closed && this.outstanding === 0) {
      return Promise.resolve();
    }
    const waiter = deferred<void>();
    this.waiters.push(waiter);
    return waiter.promise;
  }

  private settle(): void {
    this.outstanding--;
    this.notifyIfDrained();
  }

  private notifyIfDrained(): void {
    if (!this.closed || this.outstanding > 0) return;

    const waiters = this.waiters.splice(0, this.waiters.length);
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }
}
