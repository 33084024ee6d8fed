/**
 * Function Unit
 *
 * Adapts a plain function into a unit of work so combinators only ever
 * depend on the WorkUnit interface.
 *
 * @module @flowkit/engine/units
 */

import { ConfigurationError, errorMessage, getLogger } from '@flowkit/core';
import type { ExecutionConfig, ResolvedExecutionConfig } from '../config/execution-config.js';
import { InvokableUnit, WorkUnit, type WorkUnitOptions } from './base.js';

const logger = getLogger('function-unit');

/**
 * Function wrapped by a FunctionUnit. Receives the child configuration,
 * which it should pass to any unit it calls.
 */
export type UnitFunction<RunInput, RunOutput> = (
  input: RunInput,
  config: ExecutionConfig
) => RunOutput | Promise<RunOutput>;

/**
 * Anything accepted where a unit is expected
 */
export type UnitLike<RunInput, RunOutput> =
  | WorkUnit<RunInput, RunOutput>
  | UnitFunction<RunInput, RunOutput>;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

export class FunctionUnit<RunInput = unknown, RunOutput = unknown> extends InvokableUnit<
  RunInput,
  RunOutput
> {
  private readonly fn: UnitFunction<RunInput, RunOutput>;

  constructor(fn: UnitFunction<RunInput, RunOutput>, options?: WorkUnitOptions) {
    super({ name: options?.name ?? (fn.name || undefined) });
    this.fn = fn;
  }

  /**
   * @throws ConfigurationError when the function is asynchronous
   */
  protected _invoke(input: RunInput, config: ResolvedExecutionConfig): RunOutput {
    const result = this.fn(input, config);
    if (isPromiseLike(result)) {
      result.then(undefined, (error: unknown) => {
        logger.debug('Discarded async result failed', {
          unit: this.getName(),
          error: errorMessage(error),
        });
      });
      throw new ConfigurationError(
        `${this.getName()} is asynchronous and cannot be invoked synchronously; use ainvoke`,
        { context: { unit: this.getName() } }
      );
    }
    return result;
  }

  protected async _ainvoke(input: RunInput, config: ResolvedExecutionConfig): Promise<RunOutput> {
    return await this.fn(input, config);
  }
}

/**
 * Normalize a unit-like value into a WorkUnit
 */
export function toWorkUnit<RunInput, RunOutput>(
  value: UnitLike<RunInput, RunOutput>,
  name?: string
): WorkUnit<RunInput, RunOutput> {
  if (value instanceof WorkUnit) {
    return value;
  }
  return new FunctionUnit(value, { name: value.name || name });
}
