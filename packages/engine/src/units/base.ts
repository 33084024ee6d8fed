/**
 * Unit of Work
 *
 * The four-mode execution contract every unit and combinator satisfies:
 * - invoke: sync single-shot
 * - ainvoke: async single-shot
 * - stream / transform: sync streaming of one input / of an input stream
 * - astream / atransform: async streaming of one input / of an input stream
 *
 * Law: the chunks of stream(x), concatenated, equal invoke(x).
 *
 * Subclasses implement the protected `_` methods; the public methods wrap
 * them with configuration, recursion checks, error normalization and hooks.
 * Extend InvokableUnit or StreamingUnit to get the other half derived.
 *
 * @module @flowkit/engine/units
 */

import { RecursionLimitError } from '@flowkit/core';
import {
  ensureConfig,
  type ExecutionConfig,
  type ResolvedExecutionConfig,
} from '../config/execution-config.js';
import { RunTracker } from '../hooks/tracker.js';
import type { RunMode } from '../hooks/types.js';
import {
  accumulate,
  accumulateAsync,
  asyncSingleton,
  singleton,
  type Accumulated,
} from '../streams/iterators.js';
import { concatChunks } from '../streams/records.js';

export interface WorkUnitOptions {
  /** Name used in hooks, logs and failures (default: class name) */
  name?: string;
}

export abstract class WorkUnit<RunInput = unknown, RunOutput = unknown> {
  protected readonly name?: string;

  constructor(options?: WorkUnitOptions) {
    this.name = options?.name;
  }

  getName(): string {
    return this.name ?? this.constructor.name;
  }

  // ===========================================================================
  // Implementation hooks
  // ===========================================================================

  protected abstract _invoke(input: RunInput, config: ResolvedExecutionConfig): RunOutput;

  protected abstract _ainvoke(
    input: RunInput,
    config: ResolvedExecutionConfig
  ): Promise<RunOutput>;

  protected abstract _transform(
    inputs: Iterable<RunInput>,
    config: ResolvedExecutionConfig
  ): Generator<RunOutput, void, undefined>;

  protected abstract _atransform(
    inputs: AsyncIterable<RunInput>,
    config: ResolvedExecutionConfig
  ): AsyncGenerator<RunOutput, void, undefined>;

  // ===========================================================================
  // Public contract
  // ===========================================================================

  invoke(input: RunInput, config?: ExecutionConfig): RunOutput {
    const run = this.startRun('invoke', input, config);
    let output: RunOutput;
    try {
      output = this._invoke(input, run.childConfig);
    } catch (error) {
      throw run.fail(error);
    }
    run.end(output);
    return output;
  }

  async ainvoke(input: RunInput, config?: ExecutionConfig): Promise<RunOutput> {
    const run = this.startRun('ainvoke', input, config);
    let output: RunOutput;
    try {
      output = await this._ainvoke(input, run.childConfig);
    } catch (error) {
      throw run.fail(error);
    }
    run.end(output);
    return output;
  }

  /**
   * Stream the output for a single input
   */
  stream(input: RunInput, config?: ExecutionConfig): Generator<RunOutput, void, undefined> {
    return this.runStream('stream', input, singleton(input), config);
  }

  /**
   * Stream the output for a stream of input chunks
   */
  transform(
    inputs: Iterable<RunInput>,
    config?: ExecutionConfig
  ): Generator<RunOutput, void, undefined> {
    return this.runStream('transform', undefined, inputs, config);
  }

  astream(input: RunInput, config?: ExecutionConfig): AsyncGenerator<RunOutput, void, undefined> {
    return this.runStreamAsync('astream', input, asyncSingleton(input), config);
  }

  atransform(
    inputs: AsyncIterable<RunInput>,
    config?: ExecutionConfig
  ): AsyncGenerator<RunOutput, void, undefined> {
    return this.runStreamAsync('atransform', undefined, inputs, config);
  }

  // ===========================================================================
  // Run plumbing
  // ===========================================================================

  protected startRun(mode: RunMode, input: unknown, config?: ExecutionConfig): RunTracker {
    const resolved = ensureConfig(config);
    if (resolved.depth >= resolved.recursionLimit) {
      throw new RecursionLimitError(this.getName(), resolved.recursionLimit);
    }
    return RunTracker.start(this.getName(), mode, input, resolved);
  }

  private *runStream(
    mode: RunMode,
    input: unknown,
    inputs: Iterable<RunInput>,
    config?: ExecutionConfig
  ): Generator<RunOutput, void, undefined> {
    const run = this.startRun(mode, input, config);
    let acc: Accumulated<RunOutput>;
    let failed = false;
    try {
      for (const chunk of this._transform(inputs, run.childConfig)) {
        acc = acc ? { value: concatChunks(acc.value, chunk) } : { value: chunk };
        yield chunk;
      }
    } catch (error) {
      failed = true;
      throw run.fail(error);
    } finally {
      // Also reached when the consumer stops pulling
      if (!failed) {
        run.end(acc?.value);
      }
    }
  }

  private async *runStreamAsync(
    mode: RunMode,
    input: unknown,
    inputs: AsyncIterable<RunInput>,
    config?: ExecutionConfig
  ): AsyncGenerator<RunOutput, void, undefined> {
    const run = this.startRun(mode, input, config);
    let acc: Accumulated<RunOutput>;
    let failed = false;
    try {
      for await (const chunk of this._atransform(inputs, run.childConfig)) {
        acc = acc ? { value: concatChunks(acc.value, chunk) } : { value: chunk };
        yield chunk;
      }
    } catch (error) {
      failed = true;
      throw run.fail(error);
    } finally {
      if (!failed) {
        run.end(acc?.value);
      }
    }
  }
}

/**
 * Unit defined by its single-shot logic.
 *
 * Streaming computes the whole result and yields it as the sole chunk;
 * an input stream is accumulated first. An empty input stream yields nothing.
 */
export abstract class InvokableUnit<RunInput = unknown, RunOutput = unknown> extends WorkUnit<
  RunInput,
  RunOutput
> {
  protected async _ainvoke(input: RunInput, config: ResolvedExecutionConfig): Promise<RunOutput> {
    return this._invoke(input, config);
  }

  protected *_transform(
    inputs: Iterable<RunInput>,
    config: ResolvedExecutionConfig
  ): Generator<RunOutput, void, undefined> {
    const input = accumulate(inputs);
    if (input) {
      yield this._invoke(input.value, config);
    }
  }

  protected async *_atransform(
    inputs: AsyncIterable<RunInput>,
    config: ResolvedExecutionConfig
  ): AsyncGenerator<RunOutput, void, undefined> {
    const input = await accumulateAsync(inputs);
    if (input) {
      yield await this._ainvoke(input.value, config);
    }
  }
}

/**
 * Unit defined by its streaming logic.
 *
 * Single-shot calls drain the stream and return the accumulated chunks.
 */
export abstract class StreamingUnit<RunInput = unknown, RunOutput = unknown> extends WorkUnit<
  RunInput,
  RunOutput
> {
  protected _invoke(input: RunInput, config: ResolvedExecutionConfig): RunOutput {
    return this.expectOutput(accumulate(this._transform(singleton(input), config)));
  }

  protected async _ainvoke(input: RunInput, config: ResolvedExecutionConfig): Promise<RunOutput> {
    return this.expectOutput(await accumulateAsync(this._atransform(asyncSingleton(input), config)));
  }

  private expectOutput(acc: Accumulated<RunOutput>): RunOutput {
    if (!acc) {
      throw new Error(`${this.getName()} produced no output`);
    }
    return acc.value;
  }
}
