/**
 * Identity Unit
 *
 * Returns its input unchanged; streams pass chunk for chunk with no
 * accumulation. The base case of merge-assign.
 *
 * @module @flowkit/engine/units
 */

import { StreamingUnit } from './base.js';
import { MergeAssignUnit } from './merge-assign.js';
import { ParallelMapUnit, type StepMapping } from './parallel-map.js';

export class IdentityUnit<T = unknown> extends StreamingUnit<T, T> {
  /**
   * Pass a record through with additional keys computed from it
   *
   * @example
   * const withTotal = IdentityUnit.assign({
   *   total: (input) => Number(input.a) + Number(input.b),
   * });
   * withTotal.invoke({ a: 1, b: 2 }); // { a: 1, b: 2, total: 3 }
   */
  static assign(mapping: StepMapping): MergeAssignUnit {
    return new MergeAssignUnit(new ParallelMapUnit(mapping));
  }

  protected _invoke(input: T): T {
    return input;
  }

  protected async _ainvoke(input: T): Promise<T> {
    return input;
  }

  protected *_transform(inputs: Iterable<T>): Generator<T, void, undefined> {
    yield* inputs;
  }

  protected async *_atransform(inputs: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
    yield* inputs;
  }
}
