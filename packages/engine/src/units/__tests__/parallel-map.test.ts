/**
 * Parallel Map Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, TypeMismatchError, UnitFailureError } from '@flowkit/core';
import type { RunEvent, RunHook } from '../../hooks/types.js';
import type { StructuredRecord } from '../../streams/records.js';
import { StreamingUnit } from '../base.js';
import { ParallelMapUnit, attributeToStep, type StepMapping } from '../parallel-map.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Streams the characters of input.word one by one
 */
class Letters extends StreamingUnit<StructuredRecord, string> {
  protected *_transform(inputs: Iterable<StructuredRecord>): Generator<string, void, undefined> {
    for (const input of inputs) {
      yield* String(input.word);
    }
  }

  protected async *_atransform(
    inputs: AsyncIterable<StructuredRecord>
  ): AsyncGenerator<string, void, undefined> {
    for await (const input of inputs) {
      yield* String(input.word);
    }
  }
}

describe('ParallelMapUnit', () => {
  describe('invoke', () => {
    it('should collect every step output under its key', async () => {
      const unit = new ParallelMapUnit({
        sum: (input) => Number(input.a) + Number(input.b),
        keys: (input) => Object.keys(input),
      });

      expect(unit.invoke({ a: 1, b: 2 })).toEqual({ sum: 3, keys: ['a', 'b'] });
      expect(await unit.ainvoke({ a: 1, b: 2 })).toEqual({ sum: 3, keys: ['a', 'b'] });
    });

    it('should give each step its own copy of the input', () => {
      const unit = new ParallelMapUnit({
        first: (input) => {
          input.a = 100;
          return input.a;
        },
        second: (input) => input.a,
      });
      const input = { a: 1 };

      expect(unit.invoke(input)).toEqual({ first: 100, second: 1 });
      expect(input).toEqual({ a: 1 });
    });

    it('should build nested maps from nested mappings', () => {
      const unit = new ParallelMapUnit({ outer: { inner: () => 'deep' }, flat: () => 'top' });

      expect(unit.invoke({})).toEqual({ outer: { inner: 'deep' }, flat: 'top' });
    });

    it('should return an empty record for an empty mapping', () => {
      expect(new ParallelMapUnit({}).invoke({ a: 1 })).toEqual({});
    });

    it('should reject an input that is not a record', () => {
      const unit = new ParallelMapUnit({ x: () => 1 });

      expect(() => unit.invoke(5)).toThrow(TypeMismatchError);
      expect(() => unit.invoke(5)).toThrow('The input to ParallelMap<x> must be a record, received number');
    });

    it('should reject an unsupported step', () => {
      const mapping: StepMapping = {};
      Reflect.set(mapping, 'bad', 42);

      expect(() => new ParallelMapUnit(mapping)).toThrow(ConfigurationError);
    });

    it('should tag each step with its key', () => {
      const tags: string[][] = [];
      const hook: RunHook = {
        name: 'tags',
        onRunStart: (event: RunEvent) => {
          if (event.name === 'x') tags.push(event.tags);
        },
      };
      const unit = new ParallelMapUnit({ x: () => 1 });

      unit.invoke({}, { hooks: [hook], tags: ['outer'] });

      expect(tags).toEqual([['outer', 'map:key:x']]);
    });
  });

  describe('fail-fast', () => {
    it('should fail with the first failing step attributed', () => {
      let cRan = false;
      const unit = new ParallelMapUnit({
        a: () => 1,
        b: () => {
          throw new Error('b failed');
        },
        c: () => {
          cRan = true;
          return 3;
        },
      });

      let caught: unknown;
      try {
        unit.invoke({});
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnitFailureError);
      if (caught instanceof UnitFailureError) {
        expect(caught.step).toBe('b');
        expect(caught.message).toBe('b failed');
      }
      expect(cRan).toBe(false);
    });

    it('should reject ainvoke without waiting for slow siblings', async () => {
      const unit = new ParallelMapUnit({
        slow: async () => {
          await sleep(200);
          return 'late';
        },
        b: async () => {
          throw new Error('b failed');
        },
      });

      const started = Date.now();
      const caught = await unit.ainvoke({}).catch((error: unknown) => error);

      expect(caught).toBeInstanceOf(UnitFailureError);
      if (caught instanceof UnitFailureError) {
        expect(caught.step).toBe('b');
      }
      expect(Date.now() - started).toBeLessThan(200);
    });
  });

  describe('concurrency', () => {
    it('should run at most maxConcurrency steps at once', async () => {
      let active = 0;
      let maxActive = 0;
      const step = async (): Promise<number> => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await sleep(10);
        active -= 1;
        return 1;
      };
      const unit = new ParallelMapUnit({ a: step, b: step, c: step, d: step });

      const output = await unit.ainvoke({}, { maxConcurrency: 2 });

      expect(output).toEqual({ a: 1, b: 1, c: 1, d: 1 });
      expect(maxActive).toBe(2);
    });

    it('should run steps concurrently by default', async () => {
      let active = 0;
      let maxActive = 0;
      const step = async (): Promise<number> => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await sleep(10);
        active -= 1;
        return 1;
      };

      await new ParallelMapUnit({ a: step, b: step, c: step }).ainvoke({});

      expect(maxActive).toBe(3);
    });
  });

  describe('streaming', () => {
    it('should emit each step chunk under its key', () => {
      const unit = new ParallelMapUnit({ x: () => 'X', y: () => 'Y' });

      const chunks = [...unit.stream({})];

      expect(chunks).toEqual([{ x: 'X' }, { y: 'Y' }]);
      expect(Object.assign({}, ...chunks)).toEqual(unit.invoke({}));
    });

    it('should interleave streaming steps', () => {
      const unit = new ParallelMapUnit({ letters: new Letters(), n: () => 1 });

      expect([...unit.stream({ word: 'ab' })]).toEqual([{ letters: 'a' }, { n: 1 }, { letters: 'b' }]);
    });

    it('should emit every chunk in async mode', async () => {
      const unit = new ParallelMapUnit({ letters: new Letters(), n: async () => 1 });

      const chunks = await collect(unit.astream({ word: 'ab' }));

      expect(chunks).toHaveLength(3);
      expect(chunks).toEqual(expect.arrayContaining([{ letters: 'a' }, { letters: 'b' }, { n: 1 }]));
      expect(chunks.filter((chunk) => 'letters' in chunk)).toEqual([{ letters: 'a' }, { letters: 'b' }]);
    });

    it('should attribute a streaming failure to its step', async () => {
      const unit = new ParallelMapUnit({
        ok: () => 1,
        bad: async () => {
          throw new Error('stream failed');
        },
      });

      const caught = await collect(unit.astream({})).catch((error: unknown) => error);

      expect(caught).toBeInstanceOf(UnitFailureError);
      if (caught instanceof UnitFailureError) {
        expect(caught.step).toBe('bad');
      }
    });

    it('should fail a stream whose input is not a record', () => {
      const unit = new ParallelMapUnit({ x: () => 1 });

      expect(() => [...unit.stream(7)]).toThrow(TypeMismatchError);
    });

    it('should yield nothing for an empty mapping', () => {
      expect([...new ParallelMapUnit({}).stream({ a: 1 })]).toEqual([]);
    });
  });
});

describe('attributeToStep', () => {
  it('should attribute plain errors and keep the innermost step', () => {
    const plain = attributeToStep(new Error('x'), 'k');
    expect(plain).toBeInstanceOf(UnitFailureError);
    if (plain instanceof UnitFailureError) {
      expect(plain.step).toBe('k');
    }

    const inner = new UnitFailureError('y', { unit: 'u', step: 'inner' });
    expect(attributeToStep(inner, 'outer')).toBe(inner);
  });
});
