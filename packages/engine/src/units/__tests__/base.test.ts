/**
 * Unit of Work Contract Tests
 *
 * Derived modes, the streaming/invoke equivalence, error normalization,
 * hooks and the recursion limit.
 */

import { describe, it, expect, vi } from 'vitest';
import { RecursionLimitError, UnitFailureError } from '@flowkit/core';
import type { RunEndEvent, RunEvent, RunHook } from '../../hooks/types.js';
import { InvokableUnit, StreamingUnit } from '../base.js';
import { FunctionUnit } from '../function-unit.js';

class Upper extends InvokableUnit<string, string> {
  protected _invoke(input: string): string {
    return input.toUpperCase();
  }
}

class Words extends StreamingUnit<string, string> {
  protected *_transform(inputs: Iterable<string>): Generator<string, void, undefined> {
    for (const text of inputs) {
      for (const word of text.split(' ')) {
        yield `${word} `;
      }
    }
  }

  protected async *_atransform(inputs: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
    for await (const text of inputs) {
      for (const word of text.split(' ')) {
        yield `${word} `;
      }
    }
  }
}

class Silent extends StreamingUnit<string, string> {
  protected *_transform(): Generator<string, void, undefined> {
    // no output
  }

  protected async *_atransform(): AsyncGenerator<string, void, undefined> {
    // no output
  }
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

describe('InvokableUnit', () => {
  it('should answer every mode from invoke', async () => {
    const unit = new Upper();

    expect(unit.invoke('ab')).toBe('AB');
    expect(await unit.ainvoke('ab')).toBe('AB');
    expect([...unit.stream('ab')]).toEqual(['AB']);
    expect(await collect(unit.astream('ab'))).toEqual(['AB']);
  });

  it('should accumulate an input stream before invoking', async () => {
    const unit = new Upper();

    expect([...unit.transform(['ab', 'c'])]).toEqual(['ABC']);
    expect(await collect(unit.atransform(fromArray(['ab', 'c'])))).toEqual(['ABC']);
  });

  it('should yield nothing for an empty input stream', () => {
    expect([...new Upper().transform([])]).toEqual([]);
  });
});

describe('StreamingUnit', () => {
  it('should satisfy the streaming/invoke equivalence', async () => {
    const unit = new Words();

    expect([...unit.stream('to be')]).toEqual(['to ', 'be ']);
    expect(unit.invoke('to be')).toBe('to be ');
    expect(await unit.ainvoke('to be')).toBe('to be ');
    expect((await collect(unit.astream('to be'))).join('')).toBe(unit.invoke('to be'));
  });

  it('should fail invoke when the stream produces nothing', () => {
    expect(() => new Silent().invoke('x')).toThrow('Silent produced no output');
  });
});

describe('error normalization', () => {
  it('should surface a raised condition as a unit failure', () => {
    const cause = new Error('boom');
    const unit = new FunctionUnit(
      (): number => {
        throw cause;
      },
      { name: 'explode' }
    );

    let caught: unknown;
    try {
      unit.invoke(1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnitFailureError);
    if (caught instanceof UnitFailureError) {
      expect(caught.message).toBe('boom');
      expect(caught.unit).toBe('explode');
      expect(caught.cause).toBe(cause);
    }
  });

  it('should reject async failures the same way', async () => {
    const unit = new FunctionUnit(
      async (): Promise<number> => {
        throw new Error('later');
      },
      { name: 'lateFailure' }
    );

    await expect(unit.ainvoke(1)).rejects.toBeInstanceOf(UnitFailureError);
  });
});

describe('run hooks', () => {
  function recorder() {
    const events: string[] = [];
    const starts: RunEvent[] = [];
    const ends: RunEndEvent[] = [];
    const hook: RunHook = {
      name: 'recorder',
      onRunStart: (event) => {
        events.push(`start:${event.name}`);
        starts.push(event);
      },
      onRunEnd: (event) => {
        events.push(`end:${event.name}`);
        ends.push(event);
      },
      onRunError: (event) => {
        events.push(`error:${event.name}`);
      },
    };
    return { hook, events, starts, ends };
  }

  it('should observe nested calls with parent run ids', () => {
    const { hook, events, starts } = recorder();
    const inner = new FunctionUnit((n: number) => n * 2, { name: 'inner' });
    const outer = new FunctionUnit((n: number, config) => inner.invoke(n, config) + 1, {
      name: 'outer',
    });

    expect(outer.invoke(2, { hooks: [hook] })).toBe(5);

    expect(events).toEqual(['start:outer', 'start:inner', 'end:inner', 'end:outer']);
    expect(starts[0].parentRunId).toBeUndefined();
    expect(starts[1].parentRunId).toBe(starts[0].runId);
  });

  it('should report the run name to hooks without passing it down', () => {
    const { hook, events } = recorder();
    const inner = new Upper({ name: 'inner' });
    const outer = new FunctionUnit((s: string, config) => inner.invoke(s, config), { name: 'outer' });

    outer.invoke('x', { hooks: [hook], runName: 'nightly' });

    expect(events).toEqual(['start:nightly', 'start:inner', 'end:inner', 'end:nightly']);
  });

  it('should report the accumulated output of a stream', () => {
    const { hook, ends } = recorder();

    const chunks = [...new Words().stream('a b', { hooks: [hook] })];

    expect(chunks).toEqual(['a ', 'b ']);
    expect(ends[0].output).toBe('a b ');
    expect(ends[0].mode).toBe('stream');
  });

  it('should report failures to onRunError', () => {
    const { hook, events } = recorder();
    const unit = new FunctionUnit(
      (): number => {
        throw new Error('bad');
      },
      { name: 'fails' }
    );

    expect(() => unit.invoke(0, { hooks: [hook] })).toThrow('bad');
    expect(events).toEqual(['start:fails', 'error:fails']);
  });

  it('should keep running when a hook throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken: RunHook = {
      name: 'broken',
      onRunStart: () => {
        throw new Error('hook exploded');
      },
    };

    expect(new Upper().invoke('ok', { hooks: [broken] })).toBe('OK');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('recursion limit', () => {
  it('should fail calls nested deeper than the limit', () => {
    const recurse: FunctionUnit<number, number> = new FunctionUnit(
      (n: number, config) => recurse.invoke(n + 1, config),
      { name: 'recurse' }
    );

    let caught: unknown;
    try {
      recurse.invoke(0, { recursionLimit: 3 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RecursionLimitError);
    if (caught instanceof RecursionLimitError) {
      expect(caught.message).toBe('Recursion limit of 3 reached while running recurse');
    }
  });

  it('should allow calls within the limit', () => {
    const leaf = new FunctionUnit((n: number) => n, { name: 'leaf' });
    const parent = new FunctionUnit((n: number, config) => leaf.invoke(n, config), {
      name: 'parent',
    });

    expect(parent.invoke(4, { recursionLimit: 2 })).toBe(4);
  });
});
