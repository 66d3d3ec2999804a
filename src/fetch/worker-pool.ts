/**
 * Process-local bounded async worker pool.
 *
 * At most `concurrency` tasks run at once; the rest wait in FIFO order.
 * The pool holds no per-request state, so one instance is shared by every
 * pipeline run in the process.
 */

import { ConfigError } from '../utils/errors.js';

export const DEFAULT_MAX_WORKERS = 3;

export class WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly concurrency: number = DEFAULT_MAX_WORKERS) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`Worker pool concurrency must be a positive integer, got ${concurrency}`, 'INVALID_VALUE');
    }
  }

  /** Tasks currently running. */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a free worker. */
  get pending(): number {
    return this.waiting.length;
  }

  /**
   * Run a task once a worker is free. Resolves or rejects with the task.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Apply `fn` to every item through the pool. Results keep input order.
   */
  map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item, index) => this.run(() => fn(item, index))));
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      // Slot is handed over directly by release(), so `active` stays put
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
