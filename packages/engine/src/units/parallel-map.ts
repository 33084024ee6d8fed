/**
 * Parallel Map
 *
 * Runs a mapping of named sub-tasks over the same record input and collects
 * their outputs under the same names.
 *
 * - invoke: sub-tasks run one after another (sync regime)
 * - ainvoke: sub-tasks run concurrently, bounded by maxConcurrency
 * - streams: every sub-task chunk is emitted as { [name]: chunk }
 *
 * Fail-fast: the first sub-task failure fails the whole call; results of
 * siblings are discarded and running siblings are abandoned.
 *
 * @module @flowkit/engine/units
 */

import {
  ConfigurationError,
  FlowkitError,
  UnitFailureError,
  errorMessage,
} from '@flowkit/core';
import {
  withTags,
  type ResolvedExecutionConfig,
} from '../config/execution-config.js';
import { getAsyncExecutorForConfig } from '../config/executor.js';
import { asyncTee } from '../streams/async-tee.js';
import { requireRecords, requireRecordsAsync } from '../streams/iterators.js';
import { mergeKeyedStreams } from '../streams/merge.js';
import {
  expectRecord,
  isStructuredRecord,
  type StructuredRecord,
} from '../streams/records.js';
import { tee } from '../streams/tee.js';
import { WorkUnit, type WorkUnitOptions } from './base.js';
import { FunctionUnit, type UnitFunction } from './function-unit.js';

/**
 * Value accepted for one named sub-task. A nested mapping becomes a
 * nested ParallelMapUnit.
 */
export type StepLike =
  | WorkUnit<StructuredRecord, unknown>
  | UnitFunction<StructuredRecord, unknown>
  | StepMapping;

export interface StepMapping {
  [key: string]: StepLike;
}

/**
 * Attribute a sub-task failure to the key it ran under
 */
export function attributeToStep(error: unknown, key: string): FlowkitError {
  if (error instanceof UnitFailureError) {
    return error.withStep(key);
  }
  if (error instanceof FlowkitError) {
    return error;
  }
  return new UnitFailureError(errorMessage(error), { unit: key, step: key, cause: error });
}

function normalizeStep(key: string, value: StepLike): WorkUnit<StructuredRecord, unknown> {
  if (value instanceof WorkUnit) {
    return value;
  }
  if (typeof value === 'function') {
    return new FunctionUnit(value, { name: value.name || key });
  }
  if (isStructuredRecord(value)) {
    return new ParallelMapUnit(value, { name: key });
  }
  throw new ConfigurationError(`Sub-task "${key}" must be a unit, a function or a mapping`, {
    fieldErrors: { [key]: 'unsupported sub-task' },
  });
}

export class ParallelMapUnit extends WorkUnit<unknown, StructuredRecord> {
  readonly steps: Readonly<Record<string, WorkUnit<StructuredRecord, unknown>>>;

  constructor(steps: StepMapping, options?: WorkUnitOptions) {
    super(options);
    const normalized: Record<string, WorkUnit<StructuredRecord, unknown>> = {};
    for (const [key, value] of Object.entries(steps)) {
      normalized[key] = normalizeStep(key, value);
    }
    this.steps = normalized;
  }

  /** Keys the output will carry */
  get stepKeys(): string[] {
    return Object.keys(this.steps);
  }

  getName(): string {
    return this.name ?? `ParallelMap<${this.stepKeys.join(',')}>`;
  }

  protected _invoke(input: unknown, config: ResolvedExecutionConfig): StructuredRecord {
    const record = expectRecord(input, this.getName());
    const output: StructuredRecord = {};

    for (const [key, step] of Object.entries(this.steps)) {
      try {
        output[key] = step.invoke({ ...record }, this.stepConfig(config, key));
      } catch (error) {
        throw attributeToStep(error, key);
      }
    }

    return output;
  }

  protected async _ainvoke(
    input: unknown,
    config: ResolvedExecutionConfig
  ): Promise<StructuredRecord> {
    const record = expectRecord(input, this.getName());
    const executor = getAsyncExecutorForConfig(config);

    const entries = Object.entries(this.steps);
    const values = await Promise.all(
      entries.map(([key, step]) =>
        executor
          .submit(() => step.ainvoke({ ...record }, this.stepConfig(config, key)))
          .result()
          .catch((error: unknown) => {
            throw attributeToStep(error, key);
          })
      )
    );

    const output: StructuredRecord = {};
    entries.forEach(([key], index) => {
      output[key] = values[index];
    });
    return output;
  }

  /**
   * Drive every sub-task as a stream, pulling them round-robin
   */
  protected *_transform(
    inputs: Iterable<unknown>,
    config: ResolvedExecutionConfig
  ): Generator<StructuredRecord, void, undefined> {
    const entries = Object.entries(this.steps);
    if (entries.length === 0) {
      return;
    }

    const branches = tee(requireRecords(inputs, this.getName()), entries.length);
    const streams = entries.map(([key, step], index) => ({
      key,
      iterator: step.transform(branches[index], this.stepConfig(config, key)),
    }));

    let active = streams;
    try {
      while (active.length > 0) {
        const stillActive: typeof streams = [];
        for (const stream of active) {
          let next: IteratorResult<unknown, void>;
          try {
            next = stream.iterator.next();
          } catch (error) {
            throw attributeToStep(error, stream.key);
          }
          if (next.done) {
            continue;
          }
          stillActive.push(stream);
          yield { [stream.key]: next.value };
        }
        active = stillActive;
      }
    } finally {
      for (const stream of streams) {
        stream.iterator.return();
      }
    }
  }

  /**
   * Drive every sub-task as a stream, emitting whichever chunk is ready first
   */
  protected async *_atransform(
    inputs: AsyncIterable<unknown>,
    config: ResolvedExecutionConfig
  ): AsyncGenerator<StructuredRecord, void, undefined> {
    const entries = Object.entries(this.steps);
    if (entries.length === 0) {
      return;
    }

    const branches = asyncTee(requireRecordsAsync(inputs, this.getName()), entries.length);
    const streams = entries.map(([key, step], index) => ({
      key,
      iterator: step.atransform(branches[index], this.stepConfig(config, key)),
    }));

    const merged = mergeKeyedStreams(streams, (key, error) => attributeToStep(error, key));
    for await (const chunk of merged) {
      yield { [chunk.key]: chunk.value };
    }
  }

  private stepConfig(config: ResolvedExecutionConfig, key: string): ResolvedExecutionConfig {
    return withTags(config, `map:key:${key}`);
  }
}
