/**
 * Executors
 *
 * Background work for the two regimes:
 * - SyncExecutor: synchronous call trees. The inline executor runs work at
 *   submission (Node has one thread) and hands back its settled outcome.
 * - AsyncExecutor: cooperative call trees. Runs work under a parallelism
 *   limit and hands back a BackgroundTask.
 *
 * @module @flowkit/engine/config
 */

import type { ResolvedExecutionConfig } from './execution-config.js';

/**
 * Outcome of a piece of work
 */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Handle to work submitted to a SyncExecutor
 */
export class Deferred<T> {
  constructor(private readonly outcome: Settled<T>) {}

  /**
   * @returns the value, or rethrows the failure
   */
  result(): T {
    if (this.outcome.ok) {
      return this.outcome.value;
    }
    throw this.outcome.error;
  }
}

export interface SyncExecutor {
  submit<T>(fn: () => T): Deferred<T>;
}

/**
 * Executor that runs work on the caller's stack
 */
export const inlineExecutor: SyncExecutor = {
  submit<T>(fn: () => T): Deferred<T> {
    try {
      return new Deferred<T>({ ok: true, value: fn() });
    } catch (error) {
      return new Deferred<T>({ ok: false, error });
    }
  },
};

/**
 * Handle to work running in the background.
 *
 * The outcome is captured as soon as the work settles, so a failure nobody
 * awaits is never an unhandled rejection.
 */
export class BackgroundTask<T> {
  private readonly outcome: Promise<Settled<T>>;

  constructor(work: Promise<T>) {
    this.outcome = work.then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error })
    );
  }

  settled(): Promise<Settled<T>> {
    return this.outcome;
  }

  async result(): Promise<T> {
    const outcome = await this.outcome;
    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }
}

/**
 * Concurrency-limited executor for the async regime
 */
export class AsyncExecutor {
  readonly maxConcurrency: number;
  private running = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(maxConcurrency: number) {
    this.maxConcurrency = Math.max(1, maxConcurrency);
  }

  /** Work currently holding a slot */
  get activeCount(): number {
    return this.running;
  }

  /** Work waiting for a slot */
  get pendingCount(): number {
    return this.waiting.length;
  }

  submit<T>(fn: () => Promise<T>): BackgroundTask<T> {
    return new BackgroundTask(this.run(fn));
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.maxConcurrency) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.running += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.running -= 1;
    const next = this.waiting.shift();
    next?.();
  }
}

/**
 * Executor for background work in a synchronous call tree
 */
export function getExecutorForConfig(config?: { executor?: SyncExecutor }): SyncExecutor {
  return config?.executor ?? inlineExecutor;
}

/**
 * Executor for background work in an asynchronous call tree
 */
export function getAsyncExecutorForConfig(config: ResolvedExecutionConfig): AsyncExecutor {
  return new AsyncExecutor(config.maxConcurrency);
}
