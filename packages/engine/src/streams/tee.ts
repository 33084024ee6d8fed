/**
 * Sequence Tee
 *
 * Splits one lazily produced sequence into N independently paced branches.
 * The source is pulled at most once per item; items not yet consumed by a
 * branch wait in that branch's buffer.
 *
 * @module @flowkit/engine/streams
 */

import { ConfigurationError, FlowkitError } from '@flowkit/core';

/**
 * Outcome of the shared source once it stops producing
 */
export type SourceState =
  | { status: 'open' }
  | { status: 'exhausted' }
  | { status: 'failed'; error: unknown };

export function assertBranchCount(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`Tee branch count must be a positive integer, got ${n}`, {
      fieldErrors: { n: 'must be a positive integer' },
    });
  }
}

/**
 * Synchronous tee.
 *
 * A synchronous call tree never yields to another caller in the middle of a
 * pull, so the pull-and-fan-out step needs no lock; a re-entrant pull (the
 * source reading one of its own branches) is rejected instead of pulling twice.
 */
export class Tee<T> {
  readonly branches: Generator<T, void, undefined>[];

  private readonly iterator: Iterator<T>;
  /** Per-branch FIFO; undefined once the branch is closed */
  private readonly buffers: Array<T[] | undefined>;
  private state: SourceState = { status: 'open' };
  private pulling = false;
  private openBranches: number;

  constructor(source: Iterable<T>, n = 2) {
    assertBranchCount(n);
    this.iterator = source[Symbol.iterator]();
    this.buffers = Array.from({ length: n }, (): T[] => []);
    this.openBranches = n;
    this.branches = this.buffers.map((_, index) => this.branch(index));
  }

  /** Items buffered for a branch, -1 when it is closed */
  buffered(index: number): number {
    return this.buffers[index]?.length ?? -1;
  }

  private *branch(index: number): Generator<T, void, undefined> {
    try {
      while (true) {
        const buffer = this.buffers[index];
        if (!buffer) {
          return;
        }
        if (buffer.length === 0) {
          this.pull();
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
      this.close(index);
    }
  }

  /**
   * Pull one item from the source into every open buffer
   */
  private pull(): void {
    if (this.state.status !== 'open') {
      return;
    }
    if (this.pulling) {
      throw new FlowkitError('Tee source was pulled re-entrantly', { code: 'INTERNAL_ERROR' });
    }

    this.pulling = true;
    try {
      const next = this.iterator.next();
      if (next.done) {
        this.state = { status: 'exhausted' };
        return;
      }
      for (const buffer of this.buffers) {
        buffer?.push(next.value);
      }
    } catch (error) {
      this.state = { status: 'failed', error };
    } finally {
      this.pulling = false;
    }
  }

  /**
   * Drop a branch's buffer; release the source once no branch is left
   */
  private close(index: number): void {
    if (this.buffers[index] === undefined) {
      return;
    }
    this.buffers[index] = undefined;
    this.openBranches -= 1;

    if (this.openBranches === 0 && this.state.status === 'open') {
      this.state = { status: 'exhausted' };
      this.iterator.return?.();
    }
  }
}

/**
 * Split a sequence into n independent branches
 */
export function tee<T>(source: Iterable<T>, n = 2): Generator<T, void, undefined>[] {
  return new Tee(source, n).branches;
}
