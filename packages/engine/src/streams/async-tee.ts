/**
 * Async Sequence Tee
 *
 * Cooperative counterpart of Tee. Branches may be pulled from concurrently
 * scheduled tasks, so the pull-and-fan-out step runs under an AsyncLock.
 *
 * @module @flowkit/engine/streams
 */

import { AsyncLock } from './async-lock.js';
import { assertBranchCount, type SourceState } from './tee.js';

export class AsyncTee<T> {
  readonly branches: AsyncGenerator<T, void, undefined>[];

  private readonly iterator: AsyncIterator<T>;
  private readonly lock: AsyncLock;
  private readonly buffers: Array<T[] | undefined>;
  private state: SourceState = { status: 'open' };
  private openBranches: number;

  constructor(source: AsyncIterable<T>, n = 2, lock: AsyncLock = new AsyncLock()) {
    assertBranchCount(n);
    this.iterator = source[Symbol.asyncIterator]();
    this.lock = lock;
    this.buffers = Array.from({ length: n }, (): T[] => []);
    this.openBranches = n;
    this.branches = this.buffers.map((_, index) => this.branch(index));
  }

  /** Items buffered for a branch, -1 when it is closed */
  buffered(index: number): number {
    return this.buffers[index]?.length ?? -1;
  }

  private async *branch(index: number): AsyncGenerator<T, void, undefined> {
    try {
      while (true) {
        const buffer = this.buffers[index];
        if (!buffer) {
          return;
        }
        if (buffer.length === 0) {
          await this.lock.withLock(() => this.pull(buffer));
          if (buffer.length === 0) {
            if (this.state.status === 'failed') {
              throw this.state.error;
            }
            return;
          }
        }
        const item = buffer[0];
        buffer.shift();
        yield item;
      }
    } finally {
      await this.close(index);
    }
  }

  /**
   * Pull one item into every open buffer, unless a sibling already did
   * while this branch was waiting for the lock
   */
  private async pull(buffer: T[]): Promise<void> {
    if (buffer.length > 0 || this.state.status !== 'open') {
      return;
    }

    try {
      const next = await this.iterator.next();
      if (next.done) {
        this.state = { status: 'exhausted' };
        return;
      }
      for (const b of this.buffers) {
        b?.push(next.value);
      }
    } catch (error) {
      this.state = { status: 'failed', error };
    }
  }

  private async close(index: number): Promise<void> {
    if (this.buffers[index] === undefined) {
      return;
    }
    this.buffers[index] = undefined;
    this.openBranches -= 1;

    if (this.openBranches === 0 && this.state.status === 'open') {
      this.state = { status: 'exhausted' };
      await this.iterator.return?.();
    }
  }
}

/**
 * Split an async sequence into n independent branches
 */
export function asyncTee<T>(
  source: AsyncIterable<T>,
  n = 2,
  lock?: AsyncLock
): AsyncGenerator<T, void, undefined>[] {
  return new AsyncTee(source, n, lock).branches;
}
