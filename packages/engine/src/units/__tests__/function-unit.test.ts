/**
 * Function Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@flowkit/core';
import { FunctionUnit, toWorkUnit } from '../function-unit.js';
import { IdentityUnit } from '../identity.js';

describe('FunctionUnit', () => {
  it('should take its name from the function', () => {
    function double(n: number): number {
      return n * 2;
    }

    const unit = new FunctionUnit(double);

    expect(unit.getName()).toBe('double');
    expect(unit.invoke(4)).toBe(8);
  });

  it('should await async functions in ainvoke', async () => {
    const unit = new FunctionUnit(async (n: number) => n + 1, { name: 'increment' });

    expect(await unit.ainvoke(1)).toBe(2);
  });

  it('should refuse to invoke an async function synchronously', () => {
    const unit = new FunctionUnit(async (n: number) => n + 1, { name: 'increment' });

    let caught: unknown;
    try {
      unit.invoke(1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message).toBe(
        'increment is asynchronous and cannot be invoked synchronously; use ainvoke'
      );
    }
  });

  it('should pass the child configuration to the function', () => {
    const unit = new FunctionUnit((_input: string, config) => config.depth, { name: 'depth' });

    expect(unit.invoke('x')).toBe(1);
    expect(unit.invoke('x', { depth: 3 })).toBe(4);
  });
});

describe('toWorkUnit', () => {
  it('should pass units through', () => {
    const unit = new IdentityUnit<number>();
    expect(toWorkUnit(unit)).toBe(unit);
  });

  it('should wrap functions, falling back to the given name', () => {
    const unit = toWorkUnit((n: number) => n, 'fallback');
    expect(unit).toBeInstanceOf(FunctionUnit);
    expect(unit.invoke(3)).toBe(3);
  });
});
