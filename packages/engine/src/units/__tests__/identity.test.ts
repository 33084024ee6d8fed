/**
 * Identity Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { IdentityUnit } from '../identity.js';
import { MergeAssignUnit } from '../merge-assign.js';

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

describe('IdentityUnit', () => {
  it('should return its input unchanged', async () => {
    const unit = new IdentityUnit<{ a: number }>();
    const input = { a: 1 };

    expect(unit.invoke(input)).toBe(input);
    expect(await unit.ainvoke(input)).toBe(input);
  });

  it('should pass chunks through without accumulating', async () => {
    const unit = new IdentityUnit<string>();

    expect([...unit.transform(['a', 'b', 'c'])]).toEqual(['a', 'b', 'c']);
    expect(await collect(unit.atransform(fromArray(['a', 'b'])))).toEqual(['a', 'b']);
    expect([...unit.stream('whole')]).toEqual(['whole']);
  });

  it('should build a merge-assign from a mapping', () => {
    const unit = IdentityUnit.assign({ total: (input) => Number(input.a) + Number(input.b) });

    expect(unit).toBeInstanceOf(MergeAssignUnit);
    expect(unit.invoke({ a: 1, b: 2 })).toEqual({ a: 1, b: 2, total: 3 });
  });
});
