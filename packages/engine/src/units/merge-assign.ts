/**
 * Merge-Assign
 *
 * Passes a record through and assigns the outputs of a ParallelMapUnit
 * computed over the same record. Map keys win on collision.
 *
 * Streaming forks the input: the passthrough branch is emitted first, with
 * map keys withheld, and the map branch runs in the background with one
 * chunk of lookahead. Its chunks follow once the passthrough is drained.
 *
 * @module @flowkit/engine/units
 */

import { errorMessage, getLogger } from '@flowkit/core';
import type { ResolvedExecutionConfig } from '../config/execution-config.js';
import { getAsyncExecutorForConfig, getExecutorForConfig } from '../config/executor.js';
import { asyncTee } from '../streams/async-tee.js';
import {
  assertStructuredRecord,
  expectRecord,
  omitKeys,
  type StructuredRecord,
} from '../streams/records.js';
import { tee } from '../streams/tee.js';
import { WorkUnit, type WorkUnitOptions } from './base.js';
import type { ParallelMapUnit } from './parallel-map.js';

const logger = getLogger('merge-assign');

export class MergeAssignUnit extends WorkUnit<unknown, StructuredRecord> {
  readonly mapper: ParallelMapUnit;

  constructor(mapper: ParallelMapUnit, options?: WorkUnitOptions) {
    super(options);
    this.mapper = mapper;
  }

  getName(): string {
    return this.name ?? `MergeAssign<${this.mapper.stepKeys.join(',')}>`;
  }

  protected _invoke(input: unknown, config: ResolvedExecutionConfig): StructuredRecord {
    const record = expectRecord(input, this.getName());
    return { ...record, ...this.mapper.invoke(record, config) };
  }

  protected async _ainvoke(
    input: unknown,
    config: ResolvedExecutionConfig
  ): Promise<StructuredRecord> {
    const record = expectRecord(input, this.getName());
    return { ...record, ...(await this.mapper.ainvoke(record, config)) };
  }

  protected *_transform(
    inputs: Iterable<unknown>,
    config: ResolvedExecutionConfig
  ): Generator<StructuredRecord, void, undefined> {
    const mapperKeys = new Set(this.mapper.stepKeys);
    const [forPassthrough, forMap] = tee(inputs, 2);

    const mapOutput = this.mapper.transform(forMap, config);
    const firstMapChunk = getExecutorForConfig(config).submit(() => mapOutput.next());

    try {
      for (const chunk of forPassthrough) {
        const filtered = this.filterPassthrough(chunk, mapperKeys);
        if (filtered) {
          yield filtered;
        }
      }

      const first = firstMapChunk.result();
      if (first.done) {
        return;
      }
      yield first.value;
      yield* mapOutput;
    } finally {
      mapOutput.return();
    }
  }

  protected async *_atransform(
    inputs: AsyncIterable<unknown>,
    config: ResolvedExecutionConfig
  ): AsyncGenerator<StructuredRecord, void, undefined> {
    const mapperKeys = new Set(this.mapper.stepKeys);
    const [forPassthrough, forMap] = asyncTee(inputs, 2);

    const mapOutput = this.mapper.atransform(forMap, config);
    const firstMapChunk = getAsyncExecutorForConfig(config).submit(() => mapOutput.next());

    try {
      for await (const chunk of forPassthrough) {
        const filtered = this.filterPassthrough(chunk, mapperKeys);
        if (filtered) {
          yield filtered;
        }
      }

      // A map branch abandoned by a passthrough failure keeps its outcome
      // inside the background task and is never awaited
      const first = await firstMapChunk.result();
      if (first.done) {
        return;
      }
      yield first.value;
      yield* mapOutput;
    } finally {
      // Not awaited: a map step may still be waiting on its input
      mapOutput.return(undefined).then(undefined, (error: unknown) => {
        logger.debug('Closing the map branch failed', {
          unit: this.getName(),
          error: errorMessage(error),
        });
      });
    }
  }

  /**
   * Passthrough chunk without the keys the map will assign;
   * undefined when nothing is left
   */
  private filterPassthrough(
    chunk: unknown,
    mapperKeys: ReadonlySet<string>
  ): StructuredRecord | undefined {
    assertStructuredRecord(chunk, this.getName());
    const filtered = omitKeys(chunk, mapperKeys);
    return Object.keys(filtered).length > 0 ? filtered : undefined;
  }
}
