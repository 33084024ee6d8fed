/**
 * Run Tracker Tests
 */

import { describe, it, expect } from 'vitest';
import { FlowkitError, TypeMismatchError, UnitFailureError } from '@flowkit/core';
import { ensureConfig } from '../../config/execution-config.js';
import { RunTracker, toUnitFailure } from '../tracker.js';
import type { RunEndEvent, RunErrorEvent, RunEvent, RunHook } from '../types.js';

function recordingHook() {
  const starts: RunEvent[] = [];
  const ends: RunEndEvent[] = [];
  const errors: RunErrorEvent[] = [];
  const hook: RunHook = {
    name: 'recorder',
    onRunStart: (event) => starts.push(event),
    onRunEnd: (event) => ends.push(event),
    onRunError: (event) => errors.push(event),
  };
  return { hook, starts, ends, errors };
}

describe('toUnitFailure', () => {
  it('should pass flowkit errors through', () => {
    const error = new TypeMismatchError('bad', { expected: 'record', received: 'number' });
    expect(toUnitFailure(error, 'unit')).toBe(error);
  });

  it('should wrap other errors with the unit name', () => {
    const cause = new Error('boom');
    const failure = toUnitFailure(cause, 'fetch');

    expect(failure).toBeInstanceOf(UnitFailureError);
    expect(failure.message).toBe('boom');
    expect(failure.cause).toBe(cause);
    if (failure instanceof UnitFailureError) {
      expect(failure.unit).toBe('fetch');
    }
  });
});

describe('RunTracker', () => {
  it('should report start and end with a child configuration', () => {
    const { hook, starts, ends } = recordingHook();
    const config = ensureConfig({ hooks: [hook], tags: ['t'], depth: 1, parentRunId: 'parent' });

    const run = RunTracker.start('Unit', 'invoke', 'in', config);
    run.end('out');

    expect(starts).toHaveLength(1);
    expect(starts[0]).toMatchObject({
      runId: run.runId,
      parentRunId: 'parent',
      name: 'Unit',
      mode: 'invoke',
      tags: ['t'],
      input: 'in',
    });
    expect(ends[0].output).toBe('out');
    expect(run.childConfig.parentRunId).toBe(run.runId);
    expect(run.childConfig.depth).toBe(2);
    expect(run.isSettled).toBe(true);
  });

  it('should prefer the configured run name', () => {
    const { hook, starts } = recordingHook();

    RunTracker.start('Unit', 'stream', undefined, ensureConfig({ hooks: [hook], runName: 'custom' }));

    expect(starts[0].name).toBe('custom');
  });

  it('should report a failure once and return the normalized error', () => {
    const { hook, ends, errors } = recordingHook();
    const run = RunTracker.start('Unit', 'ainvoke', 1, ensureConfig({ hooks: [hook] }));

    const failure = run.fail(new Error('nope'));
    const again = run.fail(new Error('later'));
    run.end('ignored');

    expect(failure).toBeInstanceOf(FlowkitError);
    expect(failure.message).toBe('nope');
    expect(again.message).toBe('later');
    expect(errors).toHaveLength(1);
    expect(errors[0].error).toBe(failure);
    expect(ends).toHaveLength(0);
  });
});
